/**
 * Command-line arguments
 *
 *   report-authors <input> [options]
 *
 * Flags map onto the config file's keys and are applied as the
 * highest-precedence layer.
 *
 * @module cli/args
 */

import { parseArgs } from 'util';
import { PAGE_MODES, type PageMode } from '../config/schema.js';
import type { RawConfig } from '../config/loader.js';
import { ConfigurationError } from '../utils/errors.js';

export const USAGE = `Usage: report-authors <input> [options]

Extract analyst-report authors from a PDF or a directory of PDFs.

Options:
  -c, --config FILE            JSON config file (default: ./config.json)
  -o, --output FILE            Result CSV (overrides output.csv_filename)
      --page-mode MODE         all | range | first_n
      --page-range START-END   1-based inclusive page range for range mode
      --first-n N              Pages to process in first_n mode
      --always-first           Always include the first page
      --metadata-filtering     Skip documents whose metadata headline matches a skip term
      --no-metadata-filtering
      --metadata-csv FILE      Metadata CSV with document_id and headline columns
      --max-files N            Process at most N files (0 = all)
      --skip-processed         Skip documents already in the result CSV
      --no-skip-processed
      --debug                  Verbose logging
  -h, --help                   Show this help`;

export interface CliOptions {
  input?: string;
  configPath?: string;
  overrides: RawConfig;
  help: boolean;
}

function parseInteger(flag: string, raw: string): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`--${flag} expects an integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function isPageMode(value: string): value is PageMode {
  return (PAGE_MODES as readonly string[]).includes(value);
}

export function parsePageRange(raw: string): [number, number] {
  const match = /^\s*(\d+)\s*[-,:]\s*(\d+)\s*$/.exec(raw);
  if (!match) {
    throw new ConfigurationError(`--page-range expects START-END, got "${raw}"`);
  }
  return [Number.parseInt(match[1], 10), Number.parseInt(match[2], 10)];
}

/**
 * @throws ConfigurationError for malformed flag values
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      output: { type: 'string', short: 'o' },
      'page-mode': { type: 'string' },
      'page-range': { type: 'string' },
      'first-n': { type: 'string' },
      'always-first': { type: 'boolean' },
      'metadata-filtering': { type: 'boolean' },
      'no-metadata-filtering': { type: 'boolean' },
      'metadata-csv': { type: 'string' },
      'max-files': { type: 'string' },
      'skip-processed': { type: 'boolean' },
      'no-skip-processed': { type: 'boolean' },
      debug: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const pages: RawConfig = {};
  const pageMode = values['page-mode'];
  if (pageMode !== undefined) {
    if (!isPageMode(pageMode)) {
      throw new ConfigurationError(`--page-mode must be one of ${PAGE_MODES.join(', ')}, got "${pageMode}"`);
    }
    pages.mode = pageMode;
  }
  if (values['page-range'] !== undefined) pages.range = parsePageRange(values['page-range']);
  if (values['first-n'] !== undefined) pages.first_n = parseInteger('first-n', values['first-n']);
  if (values['always-first']) pages.always_include_first = true;

  const features: RawConfig = {};
  if (values['metadata-filtering']) features.metadata_filtering = true;
  if (values['no-metadata-filtering']) features.metadata_filtering = false;

  const execution: RawConfig = {};
  if (values['max-files'] !== undefined) execution.max_files = parseInteger('max-files', values['max-files']);
  if (values['skip-processed']) execution.skip_processed_files = true;
  if (values['no-skip-processed']) execution.skip_processed_files = false;

  const overrides: RawConfig = {};
  if (Object.keys(pages).length > 0) overrides.pdf_processing = { pages_to_process: pages };
  if (Object.keys(features).length > 0) overrides.features = features;
  if (Object.keys(execution).length > 0) overrides.execution = execution;
  if (values['metadata-csv'] !== undefined) overrides.metadata = { csv_path: values['metadata-csv'] };
  if (values.output !== undefined) overrides.output = { csv_filename: values.output };
  if (values.debug) overrides.debug = { enabled: true };

  return {
    input: positionals[0],
    configPath: values.config,
    overrides,
    help: values.help === true,
  };
}
