#!/usr/bin/env node
/**
 * tfdrift CLI entry point
 *
 * Usage:
 *   tfdrift terraform.tfstate plan.json
 *   tfdrift terraform.tfstate plan.json --resources --detailed
 *   tfdrift --help
 */

import { runCli } from './cli';
import { reportUncaughtException, reportUnhandledRejection } from './cli/fatal';

process.on('uncaughtException', error => {
  reportUncaughtException(process.stderr, error);
  process.exitCode = 1;
});

process.on('unhandledRejection', reason => {
  reportUnhandledRejection(process.stderr, reason);
  process.exitCode = 1;
});

process.exitCode = runCli(process.argv.slice(2));
