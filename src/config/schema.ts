/**
 * Configuration Schema
 *
 * The JSON config file is written in snake_case and validated with zod.
 * `toAppConfig()` turns the validated file shape into the frozen camelCase
 * AppConfig that is passed explicitly to every component.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { DEFAULT_PROMPTS, type PromptTemplates } from './default-prompts.js';

export const PAGE_MODES = ['all', 'range', 'first_n'] as const;
export type PageMode = (typeof PAGE_MODES)[number];

export const DEFAULT_SKIP_TERMS = [
  'termination',
  'dropping',
  'terminate',
  'drop coverage',
  'discontinue coverage',
  'discontinuing coverage',
];

// ═══════════════════════════════════════════════════════════════════════════════
// FILE SCHEMA (snake_case, as written in config.json)
// ═══════════════════════════════════════════════════════════════════════════════

const PagesToProcessSchema = z.object({
  mode: z.enum(PAGE_MODES).default('all'),
  first_n: z.number().int().default(0),
  range: z.tuple([z.number().int(), z.number().int()]).default([1, 1]),
  always_include_first: z.boolean().default(true),
});

const OllamaSchema = z.object({
  fallback_api_url: z.string().url().default('http://localhost:11434/api/generate'),
  model: z.string().min(1).default('gemma3:27b'),
  timeout: z.number().positive().default(180),
  auto_detect: z.boolean().default(true),
  discovery: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      base_port: z.number().int().min(1).max(65535).default(11434),
      max_port: z.number().int().min(1).max(65535).default(11465),
      probe_timeout_ms: z.number().int().positive().default(100),
    })
    .default({}),
  max_workers: z.number().int().min(1).default(8),
  retry: z
    .object({
      max_attempts: z.number().int().min(1).default(2),
      base_delay_ms: z.number().int().min(0).default(500),
      max_delay_ms: z.number().int().min(0).default(5000),
    })
    .default({}),
});

const PromptsSchema = z.object({
  standard_report: z.string().default(DEFAULT_PROMPTS.standardReport),
  compilation_report: z.string().default(DEFAULT_PROMPTS.compilationReport),
  credit_suisse_specific: z.string().default(DEFAULT_PROMPTS.creditSuisseSpecific),
  first_page_emphasis: z.string().default(DEFAULT_PROMPTS.firstPageEmphasis),
  termination_specific: z.string().default(DEFAULT_PROMPTS.terminationSpecific),
});

export const ConfigFileSchema = z
  .object({
    ollama: OllamaSchema.default({}),
    pdf_processing: z
      .object({
        pages_to_process: PagesToProcessSchema.default({}),
        support_pages: z.number().int().min(0).default(3),
        image_scale: z.number().positive().default(2.0),
      })
      .default({}),
    output: z
      .object({
        csv_filename: z.string().min(1).default('author_extraction_results.csv'),
      })
      .default({}),
    features: z
      .object({
        document_type_detection: z.boolean().default(true),
        institution_detection: z.boolean().default(true),
        email_validation: z.boolean().default(true),
        prioritize_first_page: z.boolean().default(true),
        metadata_filtering: z.boolean().default(false),
      })
      .default({}),
    metadata: z
      .object({
        csv_path: z.string().default(''),
        skip_terms: z.array(z.string()).default(DEFAULT_SKIP_TERMS),
        id_extraction_pattern: z.string().default('key_(\\d+)'),
      })
      .default({}),
    execution: z
      .object({
        max_files: z.number().int().min(0).default(0),
        skip_processed_files: z.boolean().default(true),
      })
      .default({}),
    prompts: PromptsSchema.default({}),
    debug: z
      .object({
        enabled: z.boolean().default(false),
      })
      .default({}),
  })
  .superRefine((cfg, ctx) => {
    const { base_port, max_port } = cfg.ollama.discovery;
    if (max_port < base_port) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ollama', 'discovery', 'max_port'],
        message: `max_port (${max_port}) must be >= base_port (${base_port})`,
      });
    }
    try {
      new RegExp(cfg.metadata.id_extraction_pattern);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['metadata', 'id_extraction_pattern'],
        message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  });

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// APP CONFIG (camelCase, immutable)
// ═══════════════════════════════════════════════════════════════════════════════

export interface PageSelectionConfig {
  readonly mode: PageMode;
  /** Pages to take in first_n mode; <= 0 means all */
  readonly firstN: number;
  /** 1-based inclusive [start, end] used in range mode */
  readonly range: readonly [number, number];
  readonly alwaysIncludeFirst: boolean;
}

export interface DiscoveryConfig {
  readonly host: string;
  readonly basePort: number;
  readonly maxPort: number;
  readonly probeTimeoutMs: number;
}

export interface RetryConfig {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface OllamaConfig {
  readonly fallbackApiUrl: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly autoDetect: boolean;
  readonly discovery: DiscoveryConfig;
  readonly maxWorkers: number;
  readonly retry: RetryConfig;
}

export interface FeatureToggles {
  readonly documentTypeDetection: boolean;
  readonly institutionDetection: boolean;
  readonly emailValidation: boolean;
  readonly prioritizeFirstPage: boolean;
  readonly metadataFiltering: boolean;
}

export interface MetadataConfig {
  readonly csvPath: string;
  readonly skipTerms: readonly string[];
  readonly idExtractionPattern: string;
}

export interface AppConfig {
  readonly ollama: OllamaConfig;
  readonly pdf: {
    readonly pageSelection: PageSelectionConfig;
    readonly supportPages: number;
    readonly imageScale: number;
  };
  readonly output: { readonly csvPath: string };
  readonly features: FeatureToggles;
  readonly metadata: MetadataConfig;
  readonly execution: {
    readonly maxFiles: number;
    readonly skipProcessedFiles: boolean;
  };
  readonly prompts: PromptTemplates;
  readonly debug: boolean;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Map a validated config file onto the immutable runtime config.
 */
export function toAppConfig(file: ConfigFile): AppConfig {
  const pages = file.pdf_processing.pages_to_process;
  const config: AppConfig = {
    ollama: {
      fallbackApiUrl: file.ollama.fallback_api_url,
      model: file.ollama.model,
      timeoutMs: Math.round(file.ollama.timeout * 1000),
      autoDetect: file.ollama.auto_detect,
      discovery: {
        host: file.ollama.discovery.host,
        basePort: file.ollama.discovery.base_port,
        maxPort: file.ollama.discovery.max_port,
        probeTimeoutMs: file.ollama.discovery.probe_timeout_ms,
      },
      maxWorkers: file.ollama.max_workers,
      retry: {
        maxAttempts: file.ollama.retry.max_attempts,
        baseDelayMs: file.ollama.retry.base_delay_ms,
        maxDelayMs: file.ollama.retry.max_delay_ms,
      },
    },
    pdf: {
      pageSelection: {
        mode: pages.mode,
        firstN: pages.first_n,
        range: [pages.range[0], pages.range[1]],
        alwaysIncludeFirst: pages.always_include_first,
      },
      supportPages: file.pdf_processing.support_pages,
      imageScale: file.pdf_processing.image_scale,
    },
    output: { csvPath: file.output.csv_filename },
    features: {
      documentTypeDetection: file.features.document_type_detection,
      institutionDetection: file.features.institution_detection,
      emailValidation: file.features.email_validation,
      prioritizeFirstPage: file.features.prioritize_first_page,
      metadataFiltering: file.features.metadata_filtering,
    },
    metadata: {
      csvPath: file.metadata.csv_path,
      skipTerms: [...file.metadata.skip_terms],
      idExtractionPattern: file.metadata.id_extraction_pattern,
    },
    execution: {
      maxFiles: file.execution.max_files,
      skipProcessedFiles: file.execution.skip_processed_files,
    },
    prompts: {
      standardReport: file.prompts.standard_report,
      compilationReport: file.prompts.compilation_report,
      creditSuisseSpecific: file.prompts.credit_suisse_specific,
      firstPageEmphasis: file.prompts.first_page_emphasis,
      terminationSpecific: file.prompts.termination_specific,
    },
    debug: file.debug.enabled,
  };
  return deepFreeze(config);
}

/**
 * Defaults-only config. Handy for tests and library callers.
 */
export function defaultAppConfig(): AppConfig {
  return toAppConfig(ConfigFileSchema.parse({}));
}
