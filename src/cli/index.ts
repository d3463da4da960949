/**
 * CLI runner
 *
 * Parses arguments, resolves configuration and dispatches to a command.
 * Returns the process exit code instead of exiting, so it can be driven
 * from tests with fake streams.
 */

import { compareCommand, helpCommand, printUsage } from '../commands';
import { loadConfig, resolveColor } from '../config';
import { defaultReadFile, type ReadFileFn } from '../engine';
import { TerminalUI } from '../ui';
import { UsageError, errorMessage, logger, type Env, type TextSink } from '../utils';
import { VERSION } from '../version';
import { parseCliArgs, requireDocumentPaths } from './args';

export { parseCliArgs, requireDocumentPaths, type CliArgs } from './args';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface CliIO {
  stdout: TextSink;
  stderr: TextSink;
  env: Env;
  readFile: ReadFileFn;
  /** Whether stdout is a terminal; decides color when nothing else does */
  isTTY: boolean;
}

function defaultIO(): CliIO {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    readFile: defaultReadFile,
    isTTY: process.stdout.isTTY === true,
  };
}

export function runCli(args: string[], io: Partial<CliIO> = {}): number {
  const { stdout, stderr, env, readFile, isTTY } = { ...defaultIO(), ...io };
  logger.setSink(stderr);

  // Errors are reported before config is known, so never colored.
  const errorUI = new TerminalUI(stderr);

  try {
    const parsed = parseCliArgs(args);

    if (parsed.version) {
      new TerminalUI(stdout).print(`tfdrift ${VERSION}`);
      return EXIT_SUCCESS;
    }

    if (parsed.help) {
      helpCommand(new TerminalUI(stdout, { color: parsed.color ?? resolveColor(env) ?? isTTY }));
      return EXIT_SUCCESS;
    }

    const { statePath, planPath } = requireDocumentPaths(parsed);

    const config = loadConfig(env);
    if (config.logLevel) {
      logger.setLevel(config.logLevel);
    }

    const ui = new TerminalUI(stdout, { color: parsed.color ?? config.color ?? isTTY });
    const result = compareCommand(
      {
        statePath,
        planPath,
        ignoreOrder: parsed.ignoreOrder ?? config.ignoreOrder,
        resources: parsed.resources,
        detailed: parsed.detailed,
        maxValueLength: config.maxValueLength,
      },
      { ui, readFile }
    );
    logger.debug('Comparison finished', result);
    return EXIT_SUCCESS;
  } catch (error) {
    errorUI.error(`Error: ${errorMessage(error)}`);
    if (error instanceof UsageError) {
      printUsage(errorUI);
    } else {
      logger.debug('Failure details', error);
    }
    return EXIT_FAILURE;
  }
}
