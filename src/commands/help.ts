/**
 * Help Command
 *
 * Usage: tfdrift --help
 */

import type { TerminalUI } from '../ui';
import { logger } from '../utils';

interface OptionDoc {
  flag: string;
  description: string;
  default?: string;
}

const USAGE = 'tfdrift <state-file> <plan-file> [options]';

const OPTIONS: OptionDoc[] = [
  {
    flag: '--ignore-order',
    description: 'Compare arrays ignoring element order',
    default: 'false, or TFDRIFT_IGNORE_ORDER',
  },
  { flag: '--resources', description: 'Summarise drift per resource address' },
  { flag: '--detailed', description: 'With --resources, list attribute changes (implies --resources)' },
  { flag: '--no-color', description: 'Disable ANSI colors (also NO_COLOR)' },
  { flag: '-h, --help', description: 'Show this help message' },
  { flag: '-v, --version', description: 'Show version info' },
];

const EXAMPLES = [
  'tfdrift terraform.tfstate plan.json',
  'tfdrift state.json plan.json --ignore-order',
  'tfdrift state.json plan.json --resources --detailed',
];

/**
 * Short usage reminder, printed after an argument error
 */
export function printUsage(ui: TerminalUI): void {
  ui.print(`Usage: ${USAGE}`);
  ui.print('Run "tfdrift --help" for the list of options.');
}

export function helpCommand(ui: TerminalUI): void {
  logger.debug('Running help command');

  ui.print(ui.bold('tfdrift'));
  ui.print('Report drift between a Terraform state file and a plan exported as JSON.');
  ui.newLine();

  ui.print('Usage:');
  ui.print(`  ${USAGE}`);
  ui.newLine();

  ui.print('Options:');
  for (const opt of OPTIONS) {
    const defaultStr = opt.default ? ` (default: ${opt.default})` : '';
    ui.print(`  ${opt.flag.padEnd(18)} ${opt.description}${defaultStr}`);
  }
  ui.newLine();

  ui.print('Environment:');
  ui.print('  TFDRIFT_LOG_LEVEL         debug | info | warn | error (default: warn)');
  ui.print('  TFDRIFT_MAX_VALUE_LENGTH  Truncate rendered values (default: 120)');
  ui.newLine();

  ui.print('Examples:');
  for (const ex of EXAMPLES) {
    ui.print(`  ${ex}`);
  }
}
