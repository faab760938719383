import type { OutputSentinelConfig } from './schema.js';
import { DETECTION_DEFAULTS } from '../detection/types.js';

/**
 * Default configuration values.
 * Used as fallbacks when environment variables or config file are absent.
 */
export const DEFAULT_CONFIG: OutputSentinelConfig = {
  detection: {
    compositionThreshold: DETECTION_DEFAULTS.compositionThreshold,
    markerToken: DETECTION_DEFAULTS.markerToken,
    customPatterns: [],
  },
  audit: {
    enabled: false,
  },
  logLevel: 'info',
};
