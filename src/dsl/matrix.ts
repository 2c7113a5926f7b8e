/**
 * Matrix expansion.
 *
 * Turns a job's matrix strategy into the ordered list of combinations,
 * one per independent job instance. The first axis varies slowest.
 */

import { JobDefinition, MatrixCombination, MatrixDefinition, MatrixValue } from '../domain/workflow';
import { interpolate } from './expressions';
import { SCHEMA_CONSTRAINTS } from './schema';

/** Raised when a matrix expands past the per-job limit. */
export class MatrixTooLargeError extends Error {
  constructor(public readonly size: number) {
    super(`Matrix expands to ${size} combinations (limit ${SCHEMA_CONSTRAINTS.maxMatrixCombinations})`);
    this.name = 'MatrixTooLargeError';
  }
}

/** Cartesian product of the declared axes, in declaration order. */
export function cartesianProduct(axes: Record<string, MatrixValue[]>): MatrixCombination[] {
  let combinations: MatrixCombination[] = [{}];
  for (const [axis, values] of Object.entries(axes)) {
    const next: MatrixCombination[] = [];
    for (const combination of combinations) {
      for (const value of values) {
        next.push({ ...combination, [axis]: value });
      }
    }
    combinations = next;
  }
  return combinations;
}

/** Number of combinations the axes produce, before include/exclude. */
export function productSize(axes: Record<string, MatrixValue[]>): number {
  return Object.values(axes).reduce((size, values) => size * values.length, 1);
}

function sameValue(a: MatrixValue | undefined, b: MatrixValue): boolean {
  return a !== undefined && String(a) === String(b);
}

/** True when every key of `partial` has the same value in `combination`. */
export function matchesPartial(combination: MatrixCombination, partial: MatrixCombination): boolean {
  return Object.entries(partial).every(([key, value]) => sameValue(combination[key], value));
}

/**
 * Expand a matrix into its combinations.
 *
 * - `exclude` drops every product entry matching all keys of an exclusion.
 * - `include` entries are applied in order: an entry whose values for the
 *   declared axes match existing combinations extends each of them with its
 *   extra keys (without overwriting axis values); an entry matching none is
 *   appended as a new combination.
 */
export function expandMatrix(matrix: MatrixDefinition | undefined): MatrixCombination[] {
  if (!matrix) return [{}];

  const axisNames = Object.keys(matrix.axes);
  const size = productSize(matrix.axes);
  if (size > SCHEMA_CONSTRAINTS.maxMatrixCombinations) {
    throw new MatrixTooLargeError(size);
  }

  let combinations = axisNames.length > 0 ? cartesianProduct(matrix.axes) : [];
  combinations = combinations.filter(
    (combination) => !matrix.exclude.some((exclusion) => matchesPartial(combination, exclusion)),
  );

  const original = combinations.map((c) => ({ ...c }));
  for (const inclusion of matrix.include) {
    const axisPart: MatrixCombination = {};
    const extraPart: MatrixCombination = {};
    for (const [key, value] of Object.entries(inclusion)) {
      if (axisNames.includes(key)) axisPart[key] = value;
      else extraPart[key] = value;
    }

    let matched = false;
    if (Object.keys(axisPart).length > 0 || original.length > 0) {
      combinations.forEach((combination, i) => {
        if (!matchesPartial(original[i], axisPart)) return;
        // Original values stay; values added by an earlier include may be replaced.
        const conflicts = Object.entries(extraPart).some(
          ([key, value]) => key in original[i] && !sameValue(original[i][key], value),
        );
        if (conflicts) return;
        matched = true;
        combinations[i] = { ...combination, ...extraPart };
      });
    }
    if (!matched) {
      combinations.push({ ...inclusion });
      original.push({ ...inclusion });
    }
  }

  if (combinations.length > SCHEMA_CONSTRAINTS.maxMatrixCombinations) {
    throw new MatrixTooLargeError(combinations.length);
  }
  return combinations;
}

/**
 * Display name of a matrix instance when the job has no `name:`:
 * "build (ubuntu-18.04, 3.7)". Without matrix values, just the job id.
 */
export function defaultInstanceName(jobId: string, combination: MatrixCombination): string {
  const values = Object.values(combination);
  if (values.length === 0) return jobId;
  return `${jobId} (${values.map((v) => String(v)).join(', ')})`;
}

/** Display name of one matrix instance: the job's `name:` with matrix values substituted, or the default. */
export function matrixJobName(job: Pick<JobDefinition, 'id' | 'name'>, combination: MatrixCombination): string {
  if (job.name === undefined) return defaultInstanceName(job.id, combination);
  return interpolate(job.name, { contexts: { matrix: combination } }, { onlyContexts: ['matrix'] });
}
