import fs from 'fs/promises';
import { Command } from 'commander';
import { compileWorkflow } from '../../dsl/compiler';
import { parseWorkflow } from '../../dsl/parser';
import { formatPlan } from '../output';
import { printErrors } from './shared';

export const planCommand = new Command('plan')
  .description('Print the matrix jobs a workflow expands to')
  .argument('<workflow>', 'path to the workflow YAML file')
  .option('--json', 'print the compiled plan as JSON')
  .action(async (file: string, options: { json?: boolean }) => {
    const source = await fs.readFile(file, 'utf8');
    const parsed = parseWorkflow(source, file);
    parsed.warnings.forEach((warning) => console.error(`warning: ${warning}`));
    if (!parsed.definition) {
      printErrors(parsed.errors);
      process.exitCode = 2;
      return;
    }

    const result = compileWorkflow(parsed.definition);
    if (!result.plan) {
      printErrors(result.errors);
      process.exitCode = 2;
      return;
    }

    if (options.json) {
      console.log(JSON.stringify(result.plan, null, 2));
    } else {
      formatPlan(result.plan).forEach((line) => console.log(line));
    }
  });
