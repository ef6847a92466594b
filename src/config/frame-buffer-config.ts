/**
 * Frame buffer configuration
 *
 * Loads configuration from frame-buffer.config.json in the working directory
 * (or the file named by the FRAME_BUFFER_CONFIG env var).
 * All settings are optional - omit them to use defaults.
 */

import fs from 'fs';
import path from 'path';
import { getColorMatrix, type ColorMatrix } from '../formats/color-space.js';
import { createLogger, isDebugEnvEnabled, setDebugMode } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const logger = createLogger('Config');

export const CONFIG_FILE_NAME = 'frame-buffer.config.json';

/**
 * Frame buffer configuration options
 */
export interface FrameBufferConfig {
  /** Row alignment in bytes for newly allocated planes (power of two) */
  strideAlignment: number;
  /** Matrix used when converting native RGB buffers to I420 */
  colorMatrix: ColorMatrix;
  /** Enable debug logging */
  debug: boolean;
}

/**
 * Defaults; debug follows FRAME_BUFFER_DEBUG
 */
function defaultConfig(): FrameBufferConfig {
  return {
    strideAlignment: 1,
    colorMatrix: 'bt601',
    debug: isDebugEnvEnabled(),
  };
}

let cachedConfig: FrameBufferConfig | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && (value & (value - 1)) === 0;
}

/**
 * Validate raw settings on top of a base config, dropping what is invalid
 */
function sanitizeConfig(raw: unknown, base: FrameBufferConfig = defaultConfig()): FrameBufferConfig {
  const config: FrameBufferConfig = { ...base };
  if (!isRecord(raw)) {
    return config;
  }

  if (raw.strideAlignment !== undefined) {
    if (typeof raw.strideAlignment === 'number' && isPowerOfTwo(raw.strideAlignment)) {
      config.strideAlignment = raw.strideAlignment;
    } else {
      logger.warn(`Ignoring strideAlignment ${String(raw.strideAlignment)}: expected a power of two`);
    }
  }

  if (raw.colorMatrix !== undefined) {
    const matrix = typeof raw.colorMatrix === 'string' ? getColorMatrix(raw.colorMatrix) : null;
    if (matrix) {
      config.colorMatrix = matrix;
    } else {
      logger.warn(`Ignoring unknown colorMatrix ${String(raw.colorMatrix)}`);
    }
  }

  if (typeof raw.debug === 'boolean') {
    config.debug = raw.debug;
  }

  return config;
}

/**
 * Load configuration from file
 */
function loadConfig(): FrameBufferConfig {
  const configPath = process.env.FRAME_BUFFER_CONFIG ?? path.join(process.cwd(), CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) {
    if (process.env.FRAME_BUFFER_CONFIG) {
      logger.warn(`Config file ${configPath} not found, using defaults`);
    }
    return defaultConfig();
  }

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    logger.debug(`Loaded config from ${configPath}`);
    return sanitizeConfig(raw);
  } catch (err) {
    logger.warn(`Failed to read ${configPath}: ${errorMessage(err)}`);
    return defaultConfig();
  }
}

/**
 * Get the loaded configuration (cached). A file with `debug: true` turns
 * debug logging on; loading never turns it off.
 */
export function getConfig(): FrameBufferConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  const config = loadConfig();
  cachedConfig = config;
  if (config.debug) {
    setDebugMode(true);
  }
  return config;
}

/**
 * Override settings programmatically; invalid values are ignored. An
 * explicit `debug` switches debug logging to match.
 */
export function setConfig(overrides: Partial<FrameBufferConfig>): FrameBufferConfig {
  const config = sanitizeConfig(overrides, getConfig());
  cachedConfig = config;
  if (overrides.debug !== undefined) {
    setDebugMode(config.debug);
  }
  return config;
}

/**
 * Drop the cached configuration so the next getConfig() reloads it, and put
 * debug logging back to what FRAME_BUFFER_DEBUG asks for
 */
export function resetConfig(): void {
  cachedConfig = null;
  setDebugMode(isDebugEnvEnabled());
}
