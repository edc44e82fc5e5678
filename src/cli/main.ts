#!/usr/bin/env node
/**
 * manage-logs entry point. Logs its own activity through the process
 * logger registry; console records go to stderr so command output on
 * stdout stays clean.
 */

import { loadLoggingConfig } from '../logging/config.js';
import { createLoggerRegistry } from '../logging/registry.js';
import { runCli } from './manageLogs.js';

function bootstrap(): Promise<number> {
  const registry = createLoggerRegistry(loadLoggingConfig(), { consoleStream: process.stderr });
  return runCli(process.argv.slice(2), { logger: registry.getLogger('manage-logs') });
}

Promise.resolve()
  .then(bootstrap)
  .then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`manage-logs: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  },
);
