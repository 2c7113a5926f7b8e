/**
 * CLI output formatting.
 */

import { JobRun, Run, StepRunStatus } from '../domain/run';
import { RunPlan } from '../dsl/compiler';

/** One line per matrix job: `name  runs-on  matrix-json`. */
export function formatPlan(plan: RunPlan): string[] {
  const rows = plan.jobOrder.flatMap((jobId) =>
    plan.jobs[jobId].instances.map((instance) => [instance.name, instance.runsOn, JSON.stringify(instance.matrix)]),
  );
  const nameWidth = Math.max(0, ...rows.map((row) => row[0].length));
  const labelWidth = Math.max(0, ...rows.map((row) => row[1].length));
  return rows.map(([name, label, matrix]) => `${name.padEnd(nameWidth)}  ${label.padEnd(labelWidth)}  ${matrix}`);
}

const STEP_MARKS: Record<StepRunStatus, string> = {
  [StepRunStatus.Pending]: ' ',
  [StepRunStatus.Running]: '>',
  [StepRunStatus.Succeeded]: '✓',
  [StepRunStatus.Failed]: '✗',
  [StepRunStatus.TimedOut]: '⏱',
  [StepRunStatus.Canceled]: '⊘',
  [StepRunStatus.Skipped]: '-',
};

function formatDuration(ms: number | undefined): string {
  if (ms === undefined) return '';
  return ms < 1000 ? ` (${ms}ms)` : ` (${(ms / 1000).toFixed(1)}s)`;
}

function formatJob(job: JobRun): string[] {
  const lines = [`${job.status.toUpperCase().padEnd(9)} ${job.name}${formatDuration(job.durationMs)}`];
  for (const step of job.steps) {
    const detail = step.error ? `: ${step.error.code} ${step.error.message}` : '';
    lines.push(`  ${STEP_MARKS[step.status]} ${step.name}${detail}`);
  }
  return lines;
}

/** Per-job summary of a finished run. */
export function formatRunSummary(run: Run): string[] {
  const jobs = Object.values(run.jobs);
  const lines = jobs.flatMap(formatJob);
  const counts = new Map<string, number>();
  for (const job of jobs) {
    counts.set(job.status, (counts.get(job.status) ?? 0) + 1);
  }
  const tally = [...counts.entries()].map(([status, count]) => `${count} ${status}`).join(', ');
  lines.push('', `Run ${run.id} ${run.status}: ${tally}`);
  if (run.error) lines.push(`  ${run.error.code}: ${run.error.message}`);
  return lines;
}
