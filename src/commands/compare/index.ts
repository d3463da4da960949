/**
 * Compare Command
 *
 * Loads a Terraform state document and a plan document, diffs them and
 * prints the drift.
 *
 * Usage: tfdrift <state-file> <plan-file> [options]
 */

import {
  compareResources,
  computeDiff,
  extractResources,
  hasDrift,
  loadJsonDocument,
  type ReadFileFn,
} from '../../engine';
import type { TerminalUI } from '../../ui';
import { logger } from '../../utils';
import { displayDiff, displayResourceComparison } from './display';

export interface CompareOptions {
  statePath: string;
  planPath: string;
  /** Treat arrays as unordered collections */
  ignoreOrder: boolean;
  /** Summarise drift per resource address instead of dumping the raw diff */
  resources: boolean;
  /** With `resources`, also print each modified resource's changes */
  detailed: boolean;
  maxValueLength: number;
}

export interface CompareContext {
  ui: TerminalUI;
  readFile: ReadFileFn;
}

export interface CompareResult {
  drift: boolean;
}

export function compareCommand(options: CompareOptions, context: CompareContext): CompareResult {
  const { ui, readFile } = context;

  // Both documents are loaded before anything is printed so a failure on
  // the second file leaves stdout empty.
  logger.info(`Loading state from: ${options.statePath}`);
  const state = loadJsonDocument(options.statePath, readFile);
  logger.info(`Loading plan from: ${options.planPath}`);
  const plan = loadJsonDocument(options.planPath, readFile);

  const diffOptions = { ignoreOrder: options.ignoreOrder };

  if (options.resources) {
    const before = extractResources(state);
    const after = extractResources(plan);
    logger.info(`State has ${before.resources.size} resources (from ${before.source})`);
    logger.info(`Plan has ${after.resources.size} resources (from ${after.source})`);
    if (before.source === 'none' || after.source === 'none') {
      logger.warn('No resource list found in one of the documents');
    }

    const comparison = compareResources(before.resources, after.resources, diffOptions);
    displayResourceComparison(comparison, ui, {
      detailed: options.detailed,
      maxLength: options.maxValueLength,
    });
    return {
      drift:
        comparison.added.length > 0 ||
        comparison.removed.length > 0 ||
        comparison.modified.size > 0,
    };
  }

  const result = computeDiff(state, plan, diffOptions);
  if (!hasDrift(result)) {
    logger.info('No drift detected');
    return { drift: false };
  }

  logger.info('Drift detected', result.counts);
  displayDiff(result, ui, options.maxValueLength);
  return { drift: true };
}
