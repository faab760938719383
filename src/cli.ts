import * as fs from 'node:fs';
import { CorruptionDetector, compileCustomRules } from './detection/index.js';
import { AuditLogger } from './reporting/audit-logger.js';
import { log, setLogLevel } from './reporting/log.js';
import { loadConfig } from './config/loader.js';
import type { OutputSentinelConfig } from './config/schema.js';

export const VERSION = '0.1.0';

export const EXIT_ACCEPTABLE = 0;
export const EXIT_CORRUPTED = 1;
export const EXIT_USAGE = 2;

const HELP = `output-sentinel v${VERSION} - Flags corrupted text generator output

Usage:
  output-sentinel <command> [file]

Commands:
  check [file]    Print "corrupted" or "acceptable" (exit 1 when corrupted)
  inspect [file]  Print the full inspection report as JSON
  version         Show version
  help            Show this help

Without a file the sample is read from stdin.
`;

export interface CliDeps {
  readSample(file: string | undefined): Promise<string>;
  stdout(text: string): void;
  config?: OutputSentinelConfig;
}

/** Builds a detector from the `detection` section of a config. */
export function createDetector(config: OutputSentinelConfig): CorruptionDetector {
  return new CorruptionDetector({
    compositionThreshold: config.detection.compositionThreshold,
    markerToken: config.detection.markerToken,
    extraRules: compileCustomRules(config.detection.customPatterns),
  });
}

export async function runCli(args: string[], deps: CliDeps): Promise<number> {
  const [command, file] = args;

  switch (command) {
    case 'check':
    case 'inspect':
      return runDetection(command, file, deps);
    case 'version':
      deps.stdout(`output-sentinel v${VERSION}\n`);
      return EXIT_ACCEPTABLE;
    case 'help':
    case undefined:
      deps.stdout(HELP);
      return EXIT_ACCEPTABLE;
    default:
      log('error', `Unknown command: ${command}`);
      return EXIT_USAGE;
  }
}

async function runDetection(
  command: 'check' | 'inspect',
  file: string | undefined,
  deps: CliDeps,
): Promise<number> {
  const config = deps.config ?? loadConfig();
  setLogLevel(config.logLevel);

  let sample: string;
  try {
    sample = await deps.readSample(file);
  } catch (error: unknown) {
    log('error', error instanceof Error ? error.message : String(error));
    return EXIT_USAGE;
  }

  const detector = createDetector(config);
  const report = detector.inspect(sample);

  for (const d of report.detections) {
    log('debug', `${d.ruleId} ${d.ruleName} at ${d.matchOffset}: ${d.matchedContent}`);
  }

  const audit = new AuditLogger(config.audit);
  await audit.logInspection(report, file ?? 'stdin');

  if (command === 'check') {
    deps.stdout(report.corrupted ? 'corrupted\n' : 'acceptable\n');
  } else {
    deps.stdout(JSON.stringify(report, null, 2) + '\n');
  }

  return report.corrupted ? EXIT_CORRUPTED : EXIT_ACCEPTABLE;
}

/** Reads a file, or all of stdin when no file is given. */
export async function readSampleFromProcess(file: string | undefined): Promise<string> {
  if (file !== undefined) {
    return fs.promises.readFile(file, 'utf-8');
  }

  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
