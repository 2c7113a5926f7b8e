/**
 * Workflow document parser.
 *
 * Reads YAML text with the `yaml` package and hands the resulting value to
 * the validator. Comments (including commented-out matrix entries) never
 * reach the validator.
 */

import path from 'path';
import { Document, isMap, isScalar, isSeq, parseDocument } from 'yaml';
import { TypedError, createTypedError } from '../domain/errors';
import { WorkflowDefinition } from '../domain/workflow';
import { validateWorkflow } from './validator';

export interface ParseResult {
  definition?: WorkflowDefinition;
  errors: TypedError[];
  warnings: string[];
}

/** Parse and validate a workflow document. */
export function parseWorkflow(source: string, documentPath?: string): ParseResult {
  const doc = parseDocument(source);

  if (doc.errors.length > 0) {
    const errors = doc.errors.map((err) => {
      const pos = err.linePos?.[0];
      return createTypedError({
        code: 'VALIDATION.YAML_SYNTAX',
        message: pos ? `line ${pos.line}, column ${pos.col}: ${err.message}` : err.message,
        retryable: false,
        details: { path: documentPath, line: pos?.line, column: pos?.col },
      });
    });
    return { errors, warnings: [] };
  }

  const warnings = doc.warnings.map((w) => w.message);
  warnings.push(...findTruncatedFloats(doc, source));

  const fallbackName = documentPath ? path.basename(documentPath, path.extname(documentPath)) : 'workflow';
  const raw: unknown = doc.toJS();
  const result = validateWorkflow(raw, fallbackName);

  return {
    definition: result.definition,
    errors: result.errors,
    warnings: [...warnings, ...result.warnings],
  };
}

/**
 * Unquoted matrix values such as `3.10` load as the number 3.1. Report
 * every plain numeric scalar in a matrix whose text ends in a zero after
 * the decimal point.
 */
function findTruncatedFloats(doc: Document, source: string): string[] {
  const found: string[] = [];
  const jobs = doc.get('jobs', true);
  if (!isMap(jobs)) return found;

  for (const pair of jobs.items) {
    const jobId = isScalar(pair.key) ? String(pair.key.value) : '';
    const matrix = doc.getIn(['jobs', jobId, 'strategy', 'matrix'], true);
    if (!isMap(matrix)) continue;

    for (const axis of matrix.items) {
      const axisName = isScalar(axis.key) ? String(axis.key.value) : '';
      const values = axis.value;
      if (!isSeq(values)) continue;
      for (const item of values.items) {
        if (!isScalar(item) || typeof item.value !== 'number' || !item.range) continue;
        const text = source.slice(item.range[0], item.range[1]).trim();
        if (/^-?\d+\.\d*0$/.test(text)) {
          found.push(
            `jobs.${jobId}.strategy.matrix.${axisName}: unquoted value ${text} loads as ${item.value}; quote it to keep "${text}"`,
          );
        }
      }
    }
  }
  return found;
}
