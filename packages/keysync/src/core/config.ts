/**
 * KeySync Configuration Management
 *
 * Loads configuration from a YAML file (keysync-config.yaml by default) with
 * environment variable overrides and documented defaults. The file keeps the
 * snake_case keys operators write; everything past this module sees typed,
 * camelCase per-component config.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line overrides
 * 2. Environment variables (KEYSYNC_*)
 * 3. Config file
 * 4. Default values
 *
 * @module core/config
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type {
  CorruptDataPolicy,
  MissingFilePolicy,
  RunMode,
} from './types.js';
import { isLogLevel, type LogLevel } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface NormalizerConfig {
  readonly trimWhitespace: boolean;
  readonly uppercase: boolean;
  /** Single punctuation delimiter character, or false to disable collapsing */
  readonly collapseDelims: string | false;
  readonly stripNonAlnum: boolean;
  readonly leftPadNumbers: boolean;
  readonly padLength: number;
}

export interface ProvisioningConfig {
  /** `mirror` or `namespaced`; anything else falls back to `mirror` */
  readonly strategy: string;
  readonly autoApprove: boolean;
  readonly namespacePrefix: string;
}

export interface ProcessingConfig {
  readonly mode: RunMode;
  readonly batchSize: number;
  readonly parallel: boolean;
  readonly maxWorkers: number;
}

export interface ErrorHandlingConfig {
  readonly onMissingFile: MissingFilePolicy;
  readonly onCorruptData: CorruptDataPolicy;
  readonly retryAttempts: number;
  readonly retryDelaySeconds: number;
  readonly maxErrorsBeforeFail: number;
  readonly enablePartialProcessing: boolean;
}

export interface SandboxConfig {
  /** Directory that holds saved sandbox snapshots */
  readonly snapshotDir: string;
  /** Per-system cap on sandbox keys */
  readonly maxKeys: number;
  readonly defaultKeyPrefix: string;
  /** Keys generated by `sandbox init` and `sandbox reset` without a count */
  readonly defaultKeyCount: number;
}

export interface SourceConfig {
  readonly type: 'csv';
  readonly path: string;
}

export interface KeySyncConfig {
  /** Name of the authoritative system */
  readonly authoritySystem: string;
  readonly normalize: NormalizerConfig;
  readonly provisioning: ProvisioningConfig;
  readonly processing: ProcessingConfig;
  readonly errorHandling: ErrorHandlingConfig;
  readonly sources: Readonly<Record<string, SourceConfig>>;
  readonly database: { readonly path: string };
  readonly output: { readonly directory: string };
  readonly logging: { readonly level: LogLevel };
  readonly sandbox: SandboxConfig;
  /** Resolved config file path, null when running on defaults */
  readonly configPath: string | null;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_NORMALIZER_CONFIG: NormalizerConfig = {
  trimWhitespace: true,
  uppercase: true,
  collapseDelims: '-',
  stripNonAlnum: true,
  leftPadNumbers: true,
  padLength: 6,
};

export const DEFAULT_PROVISIONING_CONFIG: ProvisioningConfig = {
  strategy: 'mirror',
  autoApprove: false,
  namespacePrefix: 'MASTER',
};

export const DEFAULT_PROCESSING_CONFIG: ProcessingConfig = {
  mode: 'full',
  batchSize: 1000,
  parallel: true,
  maxWorkers: 5,
};

export const DEFAULT_ERROR_HANDLING_CONFIG: ErrorHandlingConfig = {
  onMissingFile: 'skip',
  onCorruptData: 'log',
  retryAttempts: 3,
  retryDelaySeconds: 5,
  maxErrorsBeforeFail: 100,
  enablePartialProcessing: true,
};

export const DEFAULT_SANDBOX_CONFIG: SandboxConfig = {
  snapshotDir: './output/snapshots',
  maxKeys: 10000,
  defaultKeyPrefix: 'CUST',
  defaultKeyCount: 1000,
};

export const DEFAULT_CONFIG: Omit<KeySyncConfig, 'configPath'> = {
  authoritySystem: 'A',
  normalize: DEFAULT_NORMALIZER_CONFIG,
  provisioning: DEFAULT_PROVISIONING_CONFIG,
  processing: DEFAULT_PROCESSING_CONFIG,
  errorHandling: DEFAULT_ERROR_HANDLING_CONFIG,
  sources: {
    A: { type: 'csv', path: './input/A.csv' },
    B: { type: 'csv', path: './input/B.csv' },
    C: { type: 'csv', path: './input/C.csv' },
    D: { type: 'csv', path: './input/D.csv' },
    E: { type: 'csv', path: './input/E.csv' },
  },
  database: { path: './data/keysync.db' },
  output: { directory: './output' },
  logging: { level: 'info' },
  sandbox: DEFAULT_SANDBOX_CONFIG,
};

export const DEFAULT_CONFIG_FILE = 'keysync-config.yaml';

// ============================================================================
// Config File Schema
// ============================================================================

/** Letters would change under uppercasing and digits under padding */
export const DELIMITER_PATTERN = /^[^\sA-Za-z0-9]$/;

const delimiterSchema = z
  .string()
  .regex(DELIMITER_PATTERN, 'collapse_delims must be a single punctuation character');

/**
 * Config file structure (YAML). Unknown sections are ignored.
 */
export const ConfigFileSchema = z.object({
  authority_system: z.string().min(1).optional(),
  normalize: z
    .object({
      uppercase: z.boolean().optional(),
      trim_whitespace: z.boolean().optional(),
      strip_non_alnum: z.boolean().optional(),
      collapse_delims: z.union([delimiterSchema, z.literal(false), z.null()]).optional(),
      left_pad_numbers: z.boolean().optional(),
      pad_length: z.number().int().min(1).max(64).optional(),
    })
    .optional(),
  provisioning: z
    .object({
      strategy: z.string().min(1).optional(),
      auto_approve: z.boolean().optional(),
      namespace_prefix: z.string().min(1).optional(),
    })
    .optional(),
  processing: z
    .object({
      mode: z.enum(['full', 'incremental']).optional(),
      batch_size: z.number().int().positive().optional(),
      parallel: z.boolean().optional(),
      max_workers: z.number().int().min(1).max(100).optional(),
    })
    .optional(),
  error_handling: z
    .object({
      on_missing_file: z.enum(['skip', 'fail']).optional(),
      on_corrupt_data: z.enum(['log', 'skip', 'fail']).optional(),
      retry_attempts: z.number().int().min(1).optional(),
      retry_delay_seconds: z.number().min(0).optional(),
      max_errors_before_fail: z.number().int().min(1).optional(),
      enable_partial_processing: z.boolean().optional(),
    })
    .optional(),
  sources: z
    .record(
      z.object({
        type: z.literal('csv').optional(),
        path: z.string().min(1),
      })
    )
    .optional(),
  database: z.object({ path: z.string().min(1).optional() }).optional(),
  output: z.object({ directory: z.string().min(1).optional() }).optional(),
  logging: z
    .object({
      level: z
        .string()
        .transform((level) => level.toLowerCase())
        .refine(isLogLevel, 'level must be one of debug, info, warn, error')
        .optional(),
    })
    .optional(),
  sandbox: z
    .object({
      snapshot_dir: z.string().min(1).optional(),
      max_keys: z.number().int().positive().optional(),
      default_key_prefix: z.string().min(1).optional(),
      default_key_count: z.number().int().positive().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Validate raw (already parsed) config file content
 *
 * @throws ConfigurationError listing every schema issue
 */
export function parseConfigFile(raw: unknown, source = 'config'): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration in ${source}`, issues);
  }
  return result.data;
}

// ============================================================================
// Environment
// ============================================================================

function getEnvVar(name: string): string | undefined {
  return process.env[`KEYSYNC_${name}`];
}

function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function getEnvLogLevel(): LogLevel | undefined {
  const value = getEnvVar('LOG_LEVEL')?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : undefined;
}

// ============================================================================
// Configuration Loading
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file path; missing explicit files are an error */
  configPath?: string;
  overrides?: {
    mode?: RunMode;
    autoApprove?: boolean;
    outputDir?: string;
    databasePath?: string;
    logLevel?: LogLevel;
  };
}

/**
 * Merge a validated config file over the defaults
 */
export function buildConfig(
  file: ConfigFile,
  configPath: string | null = null,
  overrides: LoadConfigOptions['overrides'] = {}
): KeySyncConfig {
  const normalize = file.normalize ?? {};
  const provisioning = file.provisioning ?? {};
  const processing = file.processing ?? {};
  const errorHandling = file.error_handling ?? {};
  const sandbox = file.sandbox ?? {};

  const fileSources: Readonly<Record<string, { readonly path: string }>> =
    file.sources ?? DEFAULT_CONFIG.sources;
  const sources: Record<string, SourceConfig> = {};
  for (const [system, source] of Object.entries(fileSources)) {
    sources[system] = { type: 'csv', path: source.path };
  }

  const config: KeySyncConfig = {
    authoritySystem: file.authority_system ?? DEFAULT_CONFIG.authoritySystem,

    normalize: {
      uppercase: normalize.uppercase ?? DEFAULT_NORMALIZER_CONFIG.uppercase,
      trimWhitespace: normalize.trim_whitespace ?? DEFAULT_NORMALIZER_CONFIG.trimWhitespace,
      stripNonAlnum: normalize.strip_non_alnum ?? DEFAULT_NORMALIZER_CONFIG.stripNonAlnum,
      collapseDelims:
        normalize.collapse_delims === null
          ? false
          : normalize.collapse_delims ?? DEFAULT_NORMALIZER_CONFIG.collapseDelims,
      leftPadNumbers: normalize.left_pad_numbers ?? DEFAULT_NORMALIZER_CONFIG.leftPadNumbers,
      padLength: normalize.pad_length ?? DEFAULT_NORMALIZER_CONFIG.padLength,
    },

    provisioning: {
      strategy: provisioning.strategy ?? DEFAULT_PROVISIONING_CONFIG.strategy,
      autoApprove:
        overrides.autoApprove ??
        provisioning.auto_approve ??
        DEFAULT_PROVISIONING_CONFIG.autoApprove,
      namespacePrefix:
        provisioning.namespace_prefix ?? DEFAULT_PROVISIONING_CONFIG.namespacePrefix,
    },

    processing: {
      mode: overrides.mode ?? processing.mode ?? DEFAULT_PROCESSING_CONFIG.mode,
      batchSize:
        getEnvNumber('BATCH_SIZE') ?? processing.batch_size ?? DEFAULT_PROCESSING_CONFIG.batchSize,
      parallel: processing.parallel ?? DEFAULT_PROCESSING_CONFIG.parallel,
      maxWorkers:
        getEnvNumber('MAX_WORKERS') ??
        processing.max_workers ??
        DEFAULT_PROCESSING_CONFIG.maxWorkers,
    },

    errorHandling: {
      onMissingFile: errorHandling.on_missing_file ?? DEFAULT_ERROR_HANDLING_CONFIG.onMissingFile,
      onCorruptData: errorHandling.on_corrupt_data ?? DEFAULT_ERROR_HANDLING_CONFIG.onCorruptData,
      retryAttempts: errorHandling.retry_attempts ?? DEFAULT_ERROR_HANDLING_CONFIG.retryAttempts,
      retryDelaySeconds:
        errorHandling.retry_delay_seconds ?? DEFAULT_ERROR_HANDLING_CONFIG.retryDelaySeconds,
      maxErrorsBeforeFail:
        errorHandling.max_errors_before_fail ??
        DEFAULT_ERROR_HANDLING_CONFIG.maxErrorsBeforeFail,
      enablePartialProcessing:
        errorHandling.enable_partial_processing ??
        DEFAULT_ERROR_HANDLING_CONFIG.enablePartialProcessing,
    },

    sources,

    database: {
      path:
        overrides.databasePath ??
        getEnvVar('DB_PATH') ??
        file.database?.path ??
        DEFAULT_CONFIG.database.path,
    },

    output: {
      directory:
        overrides.outputDir ??
        getEnvVar('OUTPUT_DIR') ??
        file.output?.directory ??
        DEFAULT_CONFIG.output.directory,
    },

    logging: {
      level:
        overrides.logLevel ??
        getEnvLogLevel() ??
        file.logging?.level ??
        DEFAULT_CONFIG.logging.level,
    },

    sandbox: {
      snapshotDir: sandbox.snapshot_dir ?? DEFAULT_SANDBOX_CONFIG.snapshotDir,
      maxKeys: sandbox.max_keys ?? DEFAULT_SANDBOX_CONFIG.maxKeys,
      defaultKeyPrefix: sandbox.default_key_prefix ?? DEFAULT_SANDBOX_CONFIG.defaultKeyPrefix,
      defaultKeyCount: sandbox.default_key_count ?? DEFAULT_SANDBOX_CONFIG.defaultKeyCount,
    },

    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * A missing default config file is not an error: defaults apply.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<KeySyncConfig> {
  let configPath: string | null = null;
  let raw: unknown = {};

  const explicitPath = options.configPath ?? getEnvVar('CONFIG');

  if (explicitPath) {
    configPath = resolve(explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
  } else if (existsSync(DEFAULT_CONFIG_FILE)) {
    configPath = resolve(DEFAULT_CONFIG_FILE);
  }

  if (configPath) {
    const content = await readFile(configPath, 'utf-8');
    try {
      raw = parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(
        `Config file ${configPath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  const file = parseConfigFile(raw, configPath ?? 'defaults');
  return buildConfig(file, configPath, options.overrides);
}

/**
 * Validate merged configuration (environment values bypass the file schema)
 *
 * @throws ConfigurationError if configuration is invalid
 */
export function validateConfig(config: KeySyncConfig): void {
  const issues: string[] = [];

  if (config.processing.maxWorkers <= 0 || config.processing.maxWorkers > 100) {
    issues.push('processing.max_workers must be between 1 and 100');
  }

  if (config.processing.batchSize <= 0) {
    issues.push('processing.batch_size must be a positive number');
  }

  if (!(config.authoritySystem in config.sources)) {
    issues.push(`sources must include the authority system '${config.authoritySystem}'`);
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid configuration', issues);
  }
}

/**
 * Resolve source file paths relative to the config file's directory
 * (or the working directory when running on defaults)
 *
 * @returns system name -> absolute file path, in configuration order
 */
export function getSystemFiles(config: KeySyncConfig): Record<string, string> {
  const files: Record<string, string> = {};
  for (const [system, source] of Object.entries(config.sources)) {
    files[system] = resolveConfigPath(config, source.path);
  }
  return files;
}

/**
 * Resolve a configured path the same way as source paths
 */
export function resolveConfigPath(config: KeySyncConfig, path: string): string {
  const basePath = config.configPath ? dirname(config.configPath) : process.cwd();
  return resolve(basePath, path);
}
