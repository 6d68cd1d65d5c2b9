/**
 * Tests for configuration loading
 *
 * @module tests/unit/config/loader
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  buildAppConfig,
  configFromEnv,
  deepMerge,
  loadAppConfig,
} from '../../../src/config/loader.js';
import { DEFAULT_PROMPTS } from '../../../src/config/default-prompts.js';
import { ConfigurationError } from '../../../src/utils/errors.js';

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays and scalars', () => {
    expect(
      deepMerge(
        { a: { b: 1, c: [1, 2] }, d: 'x' },
        { a: { c: [3] }, d: undefined, e: true }
      )
    ).toEqual({ a: { b: 1, c: [3] }, d: 'x', e: true });
  });
});

describe('configFromEnv', () => {
  it('maps model, base URL and debug flag', () => {
    expect(
      configFromEnv({
        OLLAMA_MODEL: 'llava:13b',
        OLLAMA_BASE_URL: 'http://gpu-box:11434/',
        REPORT_AUTHORS_DEBUG: 'true',
      })
    ).toEqual({
      ollama: { model: 'llava:13b', fallback_api_url: 'http://gpu-box:11434/api/generate' },
      debug: { enabled: true },
    });
    expect(configFromEnv({ REPORT_AUTHORS_DEBUG: '0' })).toEqual({});
  });
});

describe('buildAppConfig', () => {
  it('fills every default', () => {
    const config = buildAppConfig({});
    expect(config.ollama.fallbackApiUrl).toBe('http://localhost:11434/api/generate');
    expect(config.ollama.timeoutMs).toBe(180_000);
    expect(config.ollama.discovery).toEqual({ host: '127.0.0.1', basePort: 11434, maxPort: 11465, probeTimeoutMs: 100 });
    expect(config.pdf.pageSelection).toEqual({ mode: 'all', firstN: 0, range: [1, 1], alwaysIncludeFirst: true });
    expect(config.output.csvPath).toBe('author_extraction_results.csv');
    expect(config.features.metadataFiltering).toBe(false);
    expect(config.execution).toEqual({ maxFiles: 0, skipProcessedFiles: true });
    expect(config.prompts).toEqual(DEFAULT_PROMPTS);
    expect(config.debug).toBe(false);
  });

  it('returns a deeply frozen object', () => {
    const config = buildAppConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.pdf.pageSelection.range)).toBe(true);
    expect(Object.isFrozen(config.metadata.skipTerms)).toBe(true);
  });

  it('lists every invalid path', () => {
    let caught: unknown;
    try {
      buildAppConfig({
        ollama: { max_workers: 0, discovery: { base_port: 12000, max_port: 11000 } },
        pdf_processing: { pages_to_process: { mode: 'odd' } },
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    const issues = caught instanceof ConfigurationError ? caught.details?.issues : undefined;
    expect(Array.isArray(issues) && issues.map((i) => String(i).split(':')[0])).toEqual([
      'ollama.max_workers',
      'pdf_processing.pages_to_process.mode',
    ]);
  });

  it('rejects a port range that ends before it starts', () => {
    expect(() => buildAppConfig({ ollama: { discovery: { base_port: 12000, max_port: 11000 } } })).toThrow(
      'ollama.discovery.max_port: max_port (11000) must be >= base_port (12000)'
    );
  });

  it('rejects an invalid id pattern', () => {
    expect(() => buildAppConfig({ metadata: { id_extraction_pattern: 'key_(' } })).toThrow(ConfigurationError);
  });
});

describe('loadAppConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'report-authors-config-'));
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('layers file, environment and overrides', () => {
    const configPath = path.join(dir, 'config.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        ollama: { model: 'file-model', max_workers: 4 },
        pdf_processing: { pages_to_process: { mode: 'first_n', first_n: 2 } },
      })
    );

    const config = loadAppConfig({
      configPath,
      env: { OLLAMA_MODEL: 'env-model' },
      overrides: { pdf_processing: { pages_to_process: { first_n: 5 } } },
    });

    expect(config.ollama.model).toBe('env-model');
    expect(config.ollama.maxWorkers).toBe(4);
    expect(config.pdf.pageSelection.mode).toBe('first_n');
    expect(config.pdf.pageSelection.firstN).toBe(5);
  });

  it('reads the path from the environment when none is given', () => {
    const configPath = path.join(dir, 'alt.json');
    fs.writeFileSync(configPath, JSON.stringify({ output: { csv_filename: 'alt.csv' } }));
    expect(loadAppConfig({ env: { REPORT_AUTHORS_CONFIG: configPath } }).output.csvPath).toBe('alt.csv');
  });

  it('falls back to defaults for a missing or malformed file', () => {
    expect(loadAppConfig({ configPath: path.join(dir, 'absent.json'), env: {} }).ollama.model).toBe('gemma3:27b');

    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{ not json');
    expect(loadAppConfig({ configPath: broken, env: {} }).ollama.model).toBe('gemma3:27b');
  });
});
