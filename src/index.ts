#!/usr/bin/env node
import { runCli, readSampleFromProcess, EXIT_USAGE } from './cli.js';
import { log } from './reporting/log.js';

async function main(): Promise<void> {
  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      readSample: readSampleFromProcess,
      stdout: (text) => process.stdout.write(text),
    });
  } catch (error: unknown) {
    log('error', `Failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_USAGE;
  }
}

void main();
