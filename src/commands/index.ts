/**
 * CLI Commands
 */

export {
  compareCommand,
  type CompareOptions,
  type CompareContext,
  type CompareResult,
} from './compare';
export { helpCommand, printUsage } from './help';
