/**
 * Reporters for errors that escape runCli, installed by the entry point.
 */

import { errorMessage, type TextSink } from '../utils';

export function reportUncaughtException(stderr: TextSink, error: Error): void {
  stderr.write(`\x1b[31mUncaught exception: ${error.message}\x1b[0m\n`);
  if (error.stack) {
    stderr.write(`\x1b[2m${error.stack}\x1b[0m\n`);
  }
}

export function reportUnhandledRejection(stderr: TextSink, reason: unknown): void {
  stderr.write(`\x1b[31mUnhandled rejection: ${errorMessage(reason)}\x1b[0m\n`);
}
