#!/usr/bin/env node
/**
 * matrix-ci command line.
 */

import { Command } from 'commander';
import { VERSION } from '../server';
import { planCommand } from './commands/plan';
import { runCommand } from './commands/run';
import { serveCommand } from './commands/serve';

const program = new Command();

program.name('matrix-ci').description('Matrix CI runner for pull-request test workflows').version(VERSION);

program.addCommand(planCommand);
program.addCommand(runCommand);
program.addCommand(serveCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
