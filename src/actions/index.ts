/**
 * Built-in action handlers.
 */

import { ActionHandler, registerActionHandler } from '../engine/step-runner';
import { checkoutAction } from './checkout';
import { pytestAction } from './pytest';
import { runScriptAction } from './run-script';
import { setupPythonAction } from './setup-python';
import { uploadArtifactAction } from './upload-artifact';

export const BUILTIN_ACTIONS: readonly ActionHandler[] = [
  checkoutAction,
  setupPythonAction,
  pytestAction,
  uploadArtifactAction,
  runScriptAction,
];

/** Register every built-in handler. Safe to call more than once. */
export function registerBuiltinActions(): void {
  for (const handler of BUILTIN_ACTIONS) {
    registerActionHandler(handler);
  }
}

export { checkoutAction } from './checkout';
export { setupPythonAction, interpreterCandidates, parseVersionOutput, versionMatches } from './setup-python';
export { pytestAction, reportPath, REPORT_DIR } from './pytest';
export { uploadArtifactAction, resolveUploadFiles } from './upload-artifact';
export type { IfNoFilesFound } from './upload-artifact';
export { runScriptAction, parseOutputFile, shellCommand } from './run-script';
export { runProcess, processEnv, findExecutable, splitArgs } from './process';
export type { RunProcessOptions, ProcessResult } from './process';
