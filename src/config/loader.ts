/**
 * Configuration Loader
 *
 * Layers, lowest precedence first:
 *   1. schema defaults
 *   2. JSON config file (deep-merged)
 *   3. environment variables
 *   4. caller overrides (CLI flags)
 *
 * Environment variables:
 *   REPORT_AUTHORS_CONFIG  - config file path (default: ./config.json)
 *   OLLAMA_MODEL           - vision model tag
 *   OLLAMA_BASE_URL        - fallback Ollama server, e.g. http://gpu-box:11434
 *   REPORT_AUTHORS_DEBUG   - "1"/"true" enables debug logging
 *
 * @module config/loader
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigFileSchema, toAppConfig, type AppConfig } from './schema.js';
import { ConfigurationError } from '../utils/errors.js';

export type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Explicit config file path; falls back to REPORT_AUTHORS_CONFIG, then ./config.json */
  configPath?: string;
  /** Highest-precedence values in config-file shape */
  overrides?: RawConfig;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_CONFIG_FILENAME = 'config.json';

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge `source` into a copy of `target`. Arrays and scalars replace.
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

/**
 * Read a JSON config file. A missing, unreadable or malformed file is logged
 * and treated as empty so the run continues on defaults.
 */
export function readConfigFile(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) {
    console.error(`[Config] Config file not found: ${filePath}. Using default configuration`);
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (!isPlainObject(parsed)) {
      console.error(`[Config] ${filePath} does not contain a JSON object. Using default configuration`);
      return {};
    }
    console.error(`[Config] Loaded configuration from ${filePath}`);
    return parsed;
  } catch (error) {
    console.error(
      `[Config] Error loading config file ${filePath}: ${error instanceof Error ? error.message : String(error)}. Using default configuration`
    );
    return {};
  }
}

function isTruthyFlag(raw: string | undefined): boolean {
  return raw !== undefined && /^(1|true|yes|on)$/i.test(raw.trim());
}

/**
 * Environment layer in config-file shape.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const ollama: RawConfig = {};
  if (env.OLLAMA_MODEL) {
    ollama.model = env.OLLAMA_MODEL;
  }
  if (env.OLLAMA_BASE_URL) {
    ollama.fallback_api_url = `${env.OLLAMA_BASE_URL.replace(/\/+$/, '')}/api/generate`;
  }

  const layer: RawConfig = {};
  if (Object.keys(ollama).length > 0) {
    layer.ollama = ollama;
  }
  if (isTruthyFlag(env.REPORT_AUTHORS_DEBUG)) {
    layer.debug = { enabled: true };
  }
  return layer;
}

/**
 * Validate a merged raw config and freeze it into an AppConfig.
 *
 * @throws ConfigurationError listing every invalid path
 */
export function buildAppConfig(raw: RawConfig): AppConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => {
      const where = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${where}${e.message}`;
    });
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return toAppConfig(result.data);
}

/**
 * Build the immutable run configuration from every layer.
 */
export function loadAppConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const filePath = path.resolve(
    options.configPath ?? env.REPORT_AUTHORS_CONFIG ?? DEFAULT_CONFIG_FILENAME
  );

  let raw = readConfigFile(filePath);
  raw = deepMerge(raw, configFromEnv(env));
  if (options.overrides) {
    raw = deepMerge(raw, options.overrides);
  }
  return buildAppConfig(raw);
}
