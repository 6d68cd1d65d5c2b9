/**
 * CLI run: arguments -> config -> batch -> summary.
 *
 * Logs go to stderr; only the final summary is written to stdout.
 *
 * @module cli/main
 */

import { loadAppConfig } from '../config/loader.js';
import type { AppConfig } from '../config/schema.js';
import { ExtractionError, formatError } from '../utils/errors.js';
import { OllamaClient } from '../services/ollama/index.js';
import { PdfTextExtractor, PdfjsPageRenderer } from '../services/pdf/index.js';
import { formatSummary, runBatch, type BatchDependencies } from '../services/pipeline/index.js';
import { USAGE, parseCliArgs } from './args.js';

export function defaultDependencies(config: AppConfig): BatchDependencies {
  return {
    renderer: new PdfjsPageRenderer(),
    textExtractor: new PdfTextExtractor(),
    inference: new OllamaClient({ retry: config.ollama.retry }),
  };
}

/**
 * @returns Process exit code
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  makeDependencies: (config: AppConfig) => BatchDependencies = defaultDependencies
): Promise<number> {
  let config: AppConfig;
  let input: string | undefined;
  try {
    const cli = parseCliArgs(argv);
    if (cli.help) {
      process.stdout.write(`${USAGE}\n`);
      return 0;
    }
    input = cli.input;
    config = loadAppConfig({ configPath: cli.configPath, overrides: cli.overrides, env });
  } catch (error) {
    console.error(`[CLI] ${formatError(error)}`);
    console.error(USAGE);
    return 1;
  }

  if (!input) {
    console.error('[CLI] Missing input path');
    console.error(USAGE);
    return 1;
  }

  if (config.debug) {
    console.error(`[CLI] Configuration:\n${JSON.stringify(config, null, 2)}`);
  }
  console.error(`[CLI] Processing ${input} -> ${config.output.csvPath} (model ${config.ollama.model})`);

  try {
    const summary = await runBatch(input, config, makeDependencies(config));
    process.stdout.write(`${formatSummary(summary)}\n`);
    return 0;
  } catch (error) {
    const wrapped = ExtractionError.fromUnknown(error);
    console.error(`[CLI] ${formatError(wrapped)}`);
    return 1;
  }
}
