import { ResolvedStep, actionFailure } from '../engine/step-runner';

/** A `with:` input that must be present and non-empty. */
export function requireInput(step: ResolvedStep, name: string): string {
  const value = step.with[name]?.trim();
  if (!value) {
    throw actionFailure('STEP.INVALID_INPUT', `Input "${name}" is required for ${step.action}`, { input: name });
  }
  return value;
}

/** An optional `with:` input; empty strings count as absent. */
export function optionalInput(step: ResolvedStep, name: string): string | undefined {
  const value = step.with[name]?.trim();
  return value ? value : undefined;
}

/** Non-empty, trimmed lines of a multi-line input. */
export function inputLines(value: string): string[] {
  return value
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}
