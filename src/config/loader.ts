import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { OutputSentinelConfigSchema, type OutputSentinelConfig } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { log } from '../reporting/log.js';

type Section = Record<string, unknown>;

/**
 * Load configuration from environment variables and optional config file.
 *
 * Priority: Environment variables > config file > defaults.
 *
 * Config file locations (first found wins):
 *   1. OUTPUT_SENTINEL_CONFIG env var
 *   2. ~/.output-sentinel/config.json
 */
export function loadConfig(): OutputSentinelConfig {
  const fileCfg = loadConfigFile() ?? {};
  const envCfg = loadEnvConfig();

  const merged: Section = {
    ...fileCfg,
    ...envCfg,
    detection: { ...section(fileCfg.detection), ...section(envCfg.detection) },
    audit: { ...section(fileCfg.audit), ...section(envCfg.audit) },
  };

  const result = OutputSentinelConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.issues
      .map(i => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    log('error', `Configuration errors:\n${errors}`);
    log('error', 'Using defaults.');
    return structuredClone(DEFAULT_CONFIG);
  }

  return result.data;
}

function section(value: unknown): Section {
  return isSection(value) ? value : {};
}

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadConfigFile(): Section | undefined {
  const configPath = process.env.OUTPUT_SENTINEL_CONFIG ??
    path.join(os.homedir(), '.output-sentinel', 'config.json');

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch {
    // No config file is the common case
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (isSection(parsed)) return parsed;
    log('warn', `Ignoring ${configPath}: expected a JSON object`);
  } catch (error: unknown) {
    log('warn', `Ignoring ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return undefined;
}

function loadEnvConfig(): Section {
  const config: Section = {};

  if (process.env.OUTPUT_SENTINEL_LOG_LEVEL) {
    config.logLevel = process.env.OUTPUT_SENTINEL_LOG_LEVEL;
  }

  // Detection
  const detection: Section = {};
  if (process.env.OUTPUT_SENTINEL_THRESHOLD) {
    detection.compositionThreshold = parseFloat(process.env.OUTPUT_SENTINEL_THRESHOLD);
  }
  if (process.env.OUTPUT_SENTINEL_MARKER) {
    const marker = process.env.OUTPUT_SENTINEL_MARKER;
    detection.markerToken = marker === 'none' ? null : marker;
  }
  if (Object.keys(detection).length > 0) config.detection = detection;

  // Audit
  const audit: Section = {};
  if (process.env.OUTPUT_SENTINEL_AUDIT_ENABLED !== undefined) {
    audit.enabled = process.env.OUTPUT_SENTINEL_AUDIT_ENABLED === 'true';
  }
  if (process.env.OUTPUT_SENTINEL_AUDIT_DIR) {
    audit.logDir = process.env.OUTPUT_SENTINEL_AUDIT_DIR;
  }
  if (Object.keys(audit).length > 0) config.audit = audit;

  return config;
}
