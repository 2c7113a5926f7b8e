/**
 * Workflow document validator.
 *
 * Validates a parsed YAML document and normalises it into a
 * WorkflowDefinition. Every problem is reported as a TypedError carrying
 * the document path it was found at; validation never stops at the first
 * error except when the document is not a mapping at all.
 */

import { TypedError, SuggestedFix, createTypedError } from '../domain/errors';
import {
  JobDefinition,
  MatrixCombination,
  MatrixDefinition,
  MatrixValue,
  PullRequestActivity,
  StepDefinition,
  StrategyDefinition,
  TRIGGER_EVENT_NAMES,
  TriggerFilter,
  WorkflowDefinition,
} from '../domain/workflow';
import { checkExpressionSyntax } from './expressions';
import { productSize } from './matrix';
import {
  ACTION_REFERENCE_PATTERN,
  IGNORED_WORKFLOW_KEYS,
  JOB_ID_PATTERN,
  JOB_KEYS,
  SCHEMA_CONSTRAINTS,
  STEP_ID_PATTERN,
  STEP_KEYS,
  STRATEGY_KEYS,
  TRIGGER_FILTER_KEYS,
  VALID_SHELLS,
  WORKFLOW_KEYS,
  isPullRequestActivity,
  isTriggerEventName,
} from './schema';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
  /** Normalised definition; present only when valid. */
  definition?: WorkflowDefinition;
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is MatrixValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** Collects errors and warnings while walking the document. */
class Collector {
  readonly errors: TypedError[] = [];
  readonly warnings: string[] = [];

  error(code: string, message: string, path: string, fixes?: SuggestedFix[]): void {
    this.errors.push(
      createTypedError({
        code,
        message: `${path}: ${message}`,
        retryable: false,
        details: { path },
        suggestedFixes: fixes,
      }),
    );
  }

  warn(message: string, path: string): void {
    this.warnings.push(`${path}: ${message}`);
  }

  unknownKeys(record: RawRecord, known: readonly string[], path: string): void {
    for (const key of Object.keys(record)) {
      if (!known.includes(key)) this.warn(`unknown key "${key}" is ignored`, path);
    }
  }

  expression(value: string, path: string, asCondition = false): void {
    const problem = checkExpressionSyntax(value, asCondition);
    if (problem) this.error('VALIDATION.EXPRESSION', `invalid expression: ${problem}`, path);
  }
}

/** Validate a raw workflow document (the output of a YAML parse). */
export function validateWorkflow(raw: unknown, fallbackName = 'workflow'): ValidationResult {
  const c = new Collector();

  if (!isRecord(raw)) {
    c.error('VALIDATION.INVALID_TYPE', 'workflow document must be a mapping', '$');
    return { valid: false, errors: c.errors, warnings: c.warnings };
  }

  c.unknownKeys(raw, WORKFLOW_KEYS, '$');
  for (const key of IGNORED_WORKFLOW_KEYS) {
    if (key in raw) c.warn(`"${key}" has no effect and is ignored`, '$');
  }

  let name = fallbackName;
  if (raw.name !== undefined) {
    if (typeof raw.name !== 'string' || raw.name.trim() === '') {
      c.error('VALIDATION.INVALID_TYPE', 'must be a non-empty string', 'name');
    } else if (raw.name.length > SCHEMA_CONSTRAINTS.maxNameLength) {
      c.error('VALIDATION.NAME_TOO_LONG', `exceeds ${SCHEMA_CONSTRAINTS.maxNameLength} characters`, 'name');
    } else {
      name = raw.name;
    }
  }

  const on = validateTriggers(raw.on, c);
  const env = validateEnv(raw.env, 'env', c);
  const jobs = validateJobs(raw.jobs, c);
  validateJobGraph(jobs, c);

  if (c.errors.length > 0) {
    return { valid: false, errors: c.errors, warnings: c.warnings };
  }
  return {
    valid: true,
    errors: [],
    warnings: c.warnings,
    definition: { name, on, env, jobs },
  };
}

function validateTriggers(raw: unknown, c: Collector): TriggerFilter[] {
  if (raw === undefined || raw === null) {
    c.error('VALIDATION.REQUIRED_FIELD', 'missing required field', 'on', [
      { type: 'ADD_FIELD', params: { field: 'on' }, description: 'Declare the events that trigger this workflow' },
    ]);
    return [];
  }

  const entries: Array<[string, unknown]> = [];
  if (typeof raw === 'string') {
    entries.push([raw, null]);
  } else if (Array.isArray(raw)) {
    raw.forEach((item, i) => {
      if (typeof item === 'string') entries.push([item, null]);
      else c.error('VALIDATION.INVALID_TYPE', 'event names must be strings', `on[${i}]`);
    });
  } else if (isRecord(raw)) {
    entries.push(...Object.entries(raw));
  } else {
    c.error('VALIDATION.INVALID_TYPE', 'must be an event name, a list of event names, or a mapping', 'on');
    return [];
  }

  const filters: TriggerFilter[] = [];
  for (const [event, config] of entries) {
    const path = `on.${event}`;
    if (!isTriggerEventName(event)) {
      c.error('VALIDATION.UNKNOWN_EVENT', `unsupported event "${event}"`, path, [
        { type: 'USE_EVENT', params: { events: [...TRIGGER_EVENT_NAMES] }, description: 'Use a supported trigger event' },
      ]);
      continue;
    }
    const filter: TriggerFilter = { event };
    if (config !== null && config !== undefined) {
      if (!isRecord(config)) {
        c.error('VALIDATION.INVALID_TYPE', 'trigger configuration must be a mapping', path);
        continue;
      }
      c.unknownKeys(config, TRIGGER_FILTER_KEYS, path);
      if (config.paths !== undefined || config['paths-ignore'] !== undefined) {
        c.warn('path filters are not evaluated; the workflow runs for every change', path);
      }
      filter.branches = readStringList(config.branches, `${path}.branches`, c);
      filter.branchesIgnore = readStringList(config['branches-ignore'], `${path}.branches-ignore`, c);
      if (filter.branches && filter.branchesIgnore) {
        c.error('VALIDATION.CONFLICTING_FILTERS', 'branches and branches-ignore cannot both be set', path);
      }
      const types = readStringList(config.types, `${path}.types`, c);
      if (types) {
        if (event !== 'pull_request') {
          c.warn('"types" only applies to pull_request and is ignored', path);
        } else {
          const valid: PullRequestActivity[] = [];
          for (const type of types) {
            if (isPullRequestActivity(type)) valid.push(type);
            else c.error('VALIDATION.UNKNOWN_ACTIVITY', `unknown pull_request type "${type}"`, `${path}.types`);
          }
          filter.types = valid;
        }
      }
    }
    filters.push(filter);
  }

  if (filters.length === 0 && c.errors.length === 0) {
    c.error('VALIDATION.REQUIRED_FIELD', 'at least one trigger event is required', 'on');
  }
  return filters;
}

function readStringList(raw: unknown, path: string, c: Collector): string[] | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === 'string') return [raw];
  if (Array.isArray(raw) && raw.every((item): item is string => typeof item === 'string')) {
    return raw;
  }
  c.error('VALIDATION.INVALID_TYPE', 'must be a string or a list of strings', path);
  return undefined;
}

function validateEnv(raw: unknown, path: string, c: Collector): Record<string, string> {
  const env: Record<string, string> = {};
  if (raw === undefined || raw === null) return env;
  if (!isRecord(raw)) {
    c.error('VALIDATION.INVALID_TYPE', 'must be a mapping of names to values', path);
    return env;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      c.error('VALIDATION.INVALID_ENV_NAME', `invalid variable name "${key}"`, `${path}.${key}`);
      continue;
    }
    if (!isScalar(value)) {
      c.error('VALIDATION.INVALID_TYPE', 'value must be a string, number or boolean', `${path}.${key}`);
      continue;
    }
    env[key] = String(value);
    c.expression(env[key], `${path}.${key}`);
  }
  return env;
}

/** Map of scalar values rendered as strings (`with:` inputs). */
function validateInputs(raw: unknown, path: string, c: Collector): Record<string, string> {
  const inputs: Record<string, string> = {};
  if (raw === undefined || raw === null) return inputs;
  if (!isRecord(raw)) {
    c.error('VALIDATION.INVALID_TYPE', 'must be a mapping', path);
    return inputs;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!isScalar(value)) {
      c.error('VALIDATION.INVALID_TYPE', 'input values must be strings, numbers or booleans', `${path}.${key}`);
      continue;
    }
    inputs[key] = String(value);
    c.expression(inputs[key], `${path}.${key}`);
  }
  return inputs;
}

function readTimeout(raw: unknown, path: string, c: Collector): number | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw !== 'number' || !Number.isFinite(raw) || raw <= 0) {
    c.error('VALIDATION.INVALID_TIMEOUT', 'must be a positive number of minutes', path);
    return undefined;
  }
  if (raw > SCHEMA_CONSTRAINTS.maxTimeoutMinutes) {
    c.error('VALIDATION.INVALID_TIMEOUT', `must not exceed ${SCHEMA_CONSTRAINTS.maxTimeoutMinutes} minutes`, path, [
      { type: 'REDUCE_TIMEOUT', params: { timeoutMinutes: SCHEMA_CONSTRAINTS.maxTimeoutMinutes } },
    ]);
    return undefined;
  }
  return raw;
}

function readBoolean(raw: unknown, fallback: boolean, path: string, c: Collector): boolean {
  if (raw === undefined || raw === null) return fallback;
  if (typeof raw !== 'boolean') {
    c.error('VALIDATION.INVALID_TYPE', 'must be true or false', path);
    return fallback;
  }
  return raw;
}

function readCondition(raw: unknown, path: string, c: Collector): string | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === 'boolean') return String(raw);
  if (typeof raw !== 'string') {
    c.error('VALIDATION.INVALID_TYPE', 'condition must be a string', path);
    return undefined;
  }
  c.expression(raw, path, true);
  return raw;
}

function validateJobs(raw: unknown, c: Collector): JobDefinition[] {
  if (raw === undefined || raw === null) {
    c.error('VALIDATION.REQUIRED_FIELD', 'missing required field', 'jobs', [
      { type: 'ADD_FIELD', params: { field: 'jobs' }, description: 'Declare at least one job' },
    ]);
    return [];
  }
  if (!isRecord(raw)) {
    c.error('VALIDATION.INVALID_TYPE', 'must be a mapping of job ids to jobs', 'jobs');
    return [];
  }
  const ids = Object.keys(raw);
  if (ids.length === 0) {
    c.error('VALIDATION.REQUIRED_FIELD', 'at least one job is required', 'jobs');
    return [];
  }
  if (ids.length > SCHEMA_CONSTRAINTS.maxJobs) {
    c.error('VALIDATION.TOO_MANY_JOBS', `at most ${SCHEMA_CONSTRAINTS.maxJobs} jobs are allowed`, 'jobs');
  }

  const jobs: JobDefinition[] = [];
  for (const id of ids) {
    const job = validateJob(id, raw[id], c);
    if (job) jobs.push(job);
  }
  return jobs;
}

function validateJob(id: string, raw: unknown, c: Collector): JobDefinition | undefined {
  const path = `jobs.${id}`;
  if (!JOB_ID_PATTERN.test(id)) {
    c.error('VALIDATION.INVALID_ID', 'job ids must start with a letter or "_" and contain only letters, digits, "-" and "_"', path);
  }
  if (!isRecord(raw)) {
    c.error('VALIDATION.INVALID_TYPE', 'job must be a mapping', path);
    return undefined;
  }
  c.unknownKeys(raw, JOB_KEYS, path);

  let name: string | undefined;
  if (raw.name !== undefined) {
    if (typeof raw.name !== 'string') c.error('VALIDATION.INVALID_TYPE', 'must be a string', `${path}.name`);
    else {
      name = raw.name;
      c.expression(name, `${path}.name`);
    }
  }

  let runsOn = '';
  const rawRunsOn = raw['runs-on'];
  if (rawRunsOn === undefined || rawRunsOn === null) {
    c.error('VALIDATION.REQUIRED_FIELD', 'missing required field', `${path}.runs-on`, [
      { type: 'ADD_FIELD', params: { field: 'runs-on' }, description: 'Name the runner label, e.g. ubuntu-22.04' },
    ]);
  } else if (typeof rawRunsOn === 'string') {
    runsOn = rawRunsOn;
  } else if (Array.isArray(rawRunsOn) && rawRunsOn.length === 1 && typeof rawRunsOn[0] === 'string') {
    runsOn = rawRunsOn[0];
  } else {
    c.error('VALIDATION.INVALID_TYPE', 'must be a single runner label', `${path}.runs-on`);
  }
  if (runsOn) c.expression(runsOn, `${path}.runs-on`);

  const needs = readStringList(raw.needs, `${path}.needs`, c) ?? [];
  const condition = readCondition(raw.if, `${path}.if`, c);
  const env = validateEnv(raw.env, `${path}.env`, c);
  const timeoutMinutes = readTimeout(raw['timeout-minutes'], `${path}.timeout-minutes`, c);
  const continueOnError = readBoolean(raw['continue-on-error'], false, `${path}.continue-on-error`, c);
  const strategy = raw.strategy === undefined ? undefined : validateStrategy(raw.strategy, `${path}.strategy`, c);
  const steps = validateSteps(raw.steps, `${path}.steps`, c);

  return {
    id,
    name,
    runsOn,
    needs,
    if: condition,
    env,
    timeoutMinutes,
    continueOnError,
    strategy,
    steps,
  };
}

function validateStrategy(raw: unknown, path: string, c: Collector): StrategyDefinition | undefined {
  if (!isRecord(raw)) {
    c.error('VALIDATION.INVALID_TYPE', 'must be a mapping', path);
    return undefined;
  }
  c.unknownKeys(raw, STRATEGY_KEYS, path);

  const failFast = readBoolean(raw['fail-fast'], true, `${path}.fail-fast`, c);
  let maxParallel: number | undefined;
  const rawMax = raw['max-parallel'];
  if (rawMax !== undefined && rawMax !== null) {
    if (typeof rawMax !== 'number' || !Number.isInteger(rawMax) || rawMax < 1) {
      c.error('VALIDATION.INVALID_TYPE', 'must be a positive integer', `${path}.max-parallel`);
    } else {
      maxParallel = rawMax;
    }
  }

  const matrix = raw.matrix === undefined ? undefined : validateMatrix(raw.matrix, `${path}.matrix`, c);
  if (!matrix) {
    if (raw.matrix === undefined) c.error('VALIDATION.REQUIRED_FIELD', 'missing required field', `${path}.matrix`);
    return undefined;
  }
  return { matrix, failFast, maxParallel };
}

function readCombinations(raw: unknown, path: string, c: Collector): MatrixCombination[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    c.error('VALIDATION.MATRIX', 'must be a list of mappings', path);
    return [];
  }
  const combinations: MatrixCombination[] = [];
  raw.forEach((entry, i) => {
    if (!isRecord(entry) || Object.keys(entry).length === 0) {
      c.error('VALIDATION.MATRIX', 'entries must be non-empty mappings', `${path}[${i}]`);
      return;
    }
    const combination: MatrixCombination = {};
    for (const [key, value] of Object.entries(entry)) {
      if (!isScalar(value)) {
        c.error('VALIDATION.MATRIX', 'values must be strings, numbers or booleans', `${path}[${i}].${key}`);
        continue;
      }
      combination[key] = value;
    }
    combinations.push(combination);
  });
  return combinations;
}

function validateMatrix(raw: unknown, path: string, c: Collector): MatrixDefinition | undefined {
  if (typeof raw === 'string') {
    c.error('VALIDATION.MATRIX', 'matrix expressions are not supported; list the axis values', path);
    return undefined;
  }
  if (!isRecord(raw)) {
    c.error('VALIDATION.MATRIX', 'must be a mapping of axis names to value lists', path);
    return undefined;
  }

  const axes: Record<string, MatrixValue[]> = {};
  for (const [axis, values] of Object.entries(raw)) {
    if (axis === 'include' || axis === 'exclude') continue;
    if (!Array.isArray(values) || values.length === 0) {
      c.error('VALIDATION.MATRIX', 'axis must be a non-empty list of values', `${path}.${axis}`, [
        { type: 'ADD_VALUE', params: { axis }, description: `List at least one value for "${axis}"` },
      ]);
      continue;
    }
    const scalars: MatrixValue[] = [];
    values.forEach((value, i) => {
      if (isScalar(value)) scalars.push(value);
      else c.error('VALIDATION.MATRIX', 'values must be strings, numbers or booleans', `${path}.${axis}[${i}]`);
    });
    axes[axis] = scalars;
  }

  const include = readCombinations(raw.include, `${path}.include`, c);
  const exclude = readCombinations(raw.exclude, `${path}.exclude`, c);

  exclude.forEach((exclusion, i) => {
    for (const key of Object.keys(exclusion)) {
      if (!(key in axes)) {
        c.error('VALIDATION.MATRIX', `exclusion names undeclared axis "${key}"`, `${path}.exclude[${i}]`);
      }
    }
  });

  if (Object.keys(axes).length === 0 && include.length === 0) {
    c.error('VALIDATION.MATRIX', 'matrix declares no axes and no include entries', path);
  }

  const size = productSize(axes);
  if (size > SCHEMA_CONSTRAINTS.maxMatrixCombinations) {
    c.error('WORKFLOW.MATRIX_TOO_LARGE', `expands to ${size} combinations (limit ${SCHEMA_CONSTRAINTS.maxMatrixCombinations})`, path);
  }

  return { axes, include, exclude };
}

function validateSteps(raw: unknown, path: string, c: Collector): StepDefinition[] {
  if (raw === undefined || raw === null) {
    c.error('VALIDATION.REQUIRED_FIELD', 'missing required field', path);
    return [];
  }
  if (!Array.isArray(raw) || raw.length === 0) {
    c.error('VALIDATION.INVALID_STEPS', 'must be a non-empty list of steps', path);
    return [];
  }
  if (raw.length > SCHEMA_CONSTRAINTS.maxStepsPerJob) {
    c.error('VALIDATION.INVALID_STEPS', `at most ${SCHEMA_CONSTRAINTS.maxStepsPerJob} steps are allowed`, path);
  }

  const seenIds = new Set<string>();
  const steps: StepDefinition[] = [];
  raw.forEach((entry, i) => {
    const step = validateStep(entry, `${path}[${i}]`, c);
    if (!step) return;
    if (step.id) {
      if (seenIds.has(step.id)) {
        c.error('VALIDATION.DUPLICATE_STEP_ID', `step id "${step.id}" is used more than once`, `${path}[${i}].id`);
      }
      seenIds.add(step.id);
    }
    steps.push(step);
  });
  return steps;
}

function validateStep(raw: unknown, path: string, c: Collector): StepDefinition | undefined {
  if (!isRecord(raw)) {
    c.error('VALIDATION.INVALID_TYPE', 'step must be a mapping', path);
    return undefined;
  }
  c.unknownKeys(raw, STEP_KEYS, path);

  const hasUses = raw.uses !== undefined && raw.uses !== null;
  const hasRun = raw.run !== undefined && raw.run !== null;
  if (hasUses === hasRun) {
    c.error('VALIDATION.STEP_KIND', 'a step needs exactly one of "uses" or "run"', path);
    return undefined;
  }

  let uses: string | undefined;
  let run: string | undefined;
  if (hasUses) {
    if (typeof raw.uses !== 'string' || !ACTION_REFERENCE_PATTERN.test(raw.uses)) {
      c.error('VALIDATION.INVALID_ACTION_REFERENCE', 'must look like "owner/name@ref" or "./path"', `${path}.uses`, [
        { type: 'FIX_REFERENCE', params: { example: 'actions/checkout@v4' } },
      ]);
    } else {
      uses = raw.uses;
    }
  } else if (typeof raw.run !== 'string' || raw.run.trim() === '') {
    c.error('VALIDATION.INVALID_TYPE', 'must be a non-empty script', `${path}.run`);
  } else {
    run = raw.run;
    c.expression(run, `${path}.run`);
  }

  let id: string | undefined;
  if (raw.id !== undefined) {
    if (typeof raw.id !== 'string' || !STEP_ID_PATTERN.test(raw.id)) {
      c.error('VALIDATION.INVALID_ID', 'step ids must start with a letter or "_"', `${path}.id`);
    } else {
      id = raw.id;
    }
  }

  let name: string | undefined;
  if (raw.name !== undefined) {
    if (typeof raw.name !== 'string') c.error('VALIDATION.INVALID_TYPE', 'must be a string', `${path}.name`);
    else {
      name = raw.name;
      c.expression(name, `${path}.name`);
    }
  }

  let shell: StepDefinition['shell'];
  if (raw.shell !== undefined) {
    if (raw.shell === 'bash' || raw.shell === 'sh') shell = raw.shell;
    else c.error('VALIDATION.INVALID_SHELL', `shell must be one of ${VALID_SHELLS.join(', ')}`, `${path}.shell`);
    if (uses) c.warn('"shell" only applies to run steps', path);
  }

  let workingDirectory: string | undefined;
  if (raw['working-directory'] !== undefined) {
    if (typeof raw['working-directory'] !== 'string') {
      c.error('VALIDATION.INVALID_TYPE', 'must be a string', `${path}.working-directory`);
    } else {
      workingDirectory = raw['working-directory'];
    }
  }

  if (run !== undefined && raw.with !== undefined) {
    c.warn('"with" only applies to action steps', path);
  }

  return {
    id,
    name,
    uses,
    run,
    shell,
    workingDirectory,
    with: validateInputs(raw.with, `${path}.with`, c),
    env: validateEnv(raw.env, `${path}.env`, c),
    if: readCondition(raw.if, `${path}.if`, c),
    timeoutMinutes: readTimeout(raw['timeout-minutes'], `${path}.timeout-minutes`, c),
    continueOnError: readBoolean(raw['continue-on-error'], false, `${path}.continue-on-error`, c),
  };
}

/** Check `needs` references and reject cycles. */
function validateJobGraph(jobs: JobDefinition[], c: Collector): void {
  const byId = new Map(jobs.map((job) => [job.id, job]));
  for (const job of jobs) {
    for (const need of job.needs) {
      if (!byId.has(need)) {
        c.error('VALIDATION.UNKNOWN_JOB', `needs unknown job "${need}"`, `jobs.${job.id}.needs`);
      } else if (need === job.id) {
        c.error('VALIDATION.CYCLE_DETECTED', 'a job cannot need itself', `jobs.${job.id}.needs`);
      }
    }
  }

  const visited = new Set<string>();
  const inStack = new Set<string>();

  function hasCycle(jobId: string): boolean {
    if (inStack.has(jobId)) return true;
    if (visited.has(jobId)) return false;

    visited.add(jobId);
    inStack.add(jobId);

    for (const need of byId.get(jobId)?.needs ?? []) {
      if (need !== jobId && byId.has(need) && hasCycle(need)) return true;
    }

    inStack.delete(jobId);
    return false;
  }

  for (const job of jobs) {
    if (hasCycle(job.id)) {
      c.error('VALIDATION.CYCLE_DETECTED', 'job dependency graph contains a cycle', 'jobs', [
        { type: 'REMOVE_CYCLE', params: {}, description: 'Remove circular "needs" between jobs' },
      ]);
      break;
    }
  }
}
