/**
 * Argument parsing for the tfdrift command line
 */

import { UsageError } from '../utils';

export interface CliArgs {
  /** State file path then plan file path */
  positionals: string[];
  /** Undefined when the flag was not given, so the environment default applies */
  ignoreOrder?: boolean;
  resources: boolean;
  detailed: boolean;
  /** `false` for --no-color, otherwise undefined */
  color?: boolean;
  help: boolean;
  version: boolean;
}

/**
 * Parse raw argv (without the node/script prefix). Anything after `--` is
 * positional, so file names starting with a dash still work.
 *
 * @throws UsageError on an unrecognised flag
 */
export function parseCliArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    positionals: [],
    resources: false,
    detailed: false,
    help: false,
    version: false,
  };

  let optionsEnded = false;
  for (const arg of args) {
    if (optionsEnded || arg === '-' || !arg.startsWith('-')) {
      parsed.positionals.push(arg);
    } else if (arg === '--') {
      optionsEnded = true;
    } else if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg === '--version' || arg === '-v') {
      parsed.version = true;
    } else if (arg === '--ignore-order') {
      parsed.ignoreOrder = true;
    } else if (arg === '--resources') {
      parsed.resources = true;
    } else if (arg === '--detailed') {
      parsed.detailed = true;
      parsed.resources = true;
    } else if (arg === '--no-color') {
      parsed.color = false;
    } else {
      throw new UsageError(`Unknown option: ${arg}`, { option: arg });
    }
  }

  return parsed;
}

/**
 * Require exactly the state and plan paths.
 *
 * @throws UsageError on a missing or extra argument
 */
export function requireDocumentPaths(parsed: CliArgs): { statePath: string; planPath: string } {
  const [statePath, planPath] = parsed.positionals;
  if (parsed.positionals.length !== 2 || statePath === undefined || planPath === undefined) {
    throw new UsageError(
      `Expected 2 arguments (state file and plan file), got ${parsed.positionals.length}`,
      { received: parsed.positionals.length }
    );
  }
  return { statePath, planPath };
}
