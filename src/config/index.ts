import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import Ajv, { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { ValidatorConfig } from '../types';
import { ConfigError, describeError } from '../core/errors';
import { Logger, defaultLogger } from '../core/logger';
import { IVOA_VOCABULARY_ROOT } from '../core/namespaces';

/**
 * Default configuration for the validator
 */
const DEFAULT_CONFIG: ValidatorConfig = {
  registryUrl: 'https://raw.githubusercontent.com/ivoa-std/Vocabularies/master/vocabs.conf',
  vocabularyRoot: IVOA_VOCABULARY_ROOT,
  timeoutMs: 30000,
  strict: false,
  crossCheck: false,
  skipRules: [],
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.vocab-validator.yml',
  '.vocab-validator.yaml',
  'vocab-validator.yml',
  'vocab-validator.yaml',
];

export type FileConfig = Partial<ValidatorConfig>;

const CONFIG_SCHEMA = {
  type: 'object',
  properties: {
    registryUrl: { type: 'string', format: 'uri' },
    vocabularyRoot: { type: 'string', format: 'uri' },
    timeoutMs: { type: 'integer', minimum: 1 },
    strict: { type: 'boolean' },
    crossCheck: { type: 'boolean' },
    skipRules: { type: 'array', items: { type: 'string' } },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);
const validateFileConfig = ajv.compile<FileConfig>(CONFIG_SCHEMA);

function describeSchemaError(error: ErrorObject): string {
  const where = error.instancePath ? error.instancePath.slice(1) : 'config';
  if (error.keyword === 'additionalProperties') {
    return `${where} has unknown key '${String(error.params.additionalProperty)}'`;
  }
  return `${where} ${error.message ?? 'is invalid'}`;
}

export interface LoadConfigOptions {
  /** Directory searched for a config file; defaults to the working directory */
  basePath?: string;
  /** Explicit config file; it must exist and be valid */
  file?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Parse and validate the YAML text of a config file
 */
export function parseConfigFile(content: string, source: string): FileConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ConfigError(source, [describeError(error)]);
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) return {};

  if (!validateFileConfig(parsed)) {
    throw new ConfigError(source, (validateFileConfig.errors ?? []).map(describeSchemaError));
  }
  return parsed;
}

/**
 * Load the validator configuration.
 *
 * Precedence, lowest first: defaults, config file, environment.
 * Command line flags are applied on top by the caller.
 */
export function loadConfig(options: LoadConfigOptions = {}): ValidatorConfig {
  const logger = options.logger ?? defaultLogger;
  const env = options.env ?? process.env;
  let fileConfig: FileConfig = {};

  if (options.file) {
    const configPath = path.resolve(options.basePath || process.cwd(), options.file);
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(configPath, ['file not found']);
    }
    fileConfig = parseConfigFile(fs.readFileSync(configPath, 'utf-8'), configPath);
  } else {
    const searchPaths = CONFIG_PATHS.map((p) => path.resolve(options.basePath || process.cwd(), p));

    for (const configPath of searchPaths) {
      if (fs.existsSync(configPath)) {
        try {
          fileConfig = parseConfigFile(fs.readFileSync(configPath, 'utf-8'), configPath);
        } catch (error) {
          logger.warn(`Ignoring config at ${configPath}: ${describeError(error)}`);
        }
        break;
      }
    }
  }

  return applyEnvironment(mergeConfig(getDefaultConfig(), fileConfig), env);
}

/**
 * Merge configuration with defaults
 */
export function mergeConfig(defaults: ValidatorConfig, override: FileConfig): ValidatorConfig {
  return {
    registryUrl: override.registryUrl ?? defaults.registryUrl,
    vocabularyRoot: override.vocabularyRoot ?? defaults.vocabularyRoot,
    timeoutMs: override.timeoutMs ?? defaults.timeoutMs,
    strict: override.strict ?? defaults.strict,
    crossCheck: override.crossCheck ?? defaults.crossCheck,
    // Skip lists accumulate rather than replace
    skipRules:
      override.skipRules !== undefined
        ? [...defaults.skipRules, ...override.skipRules]
        : defaults.skipRules,
  };
}

function applyEnvironment(config: ValidatorConfig, env: NodeJS.ProcessEnv): ValidatorConfig {
  const result = { ...config, skipRules: [...config.skipRules] };

  if (env.VOCAB_VALIDATOR_REGISTRY_URL) {
    result.registryUrl = env.VOCAB_VALIDATOR_REGISTRY_URL;
  }

  if (env.VOCAB_VALIDATOR_TIMEOUT_MS) {
    const timeout = parseInt(env.VOCAB_VALIDATOR_TIMEOUT_MS, 10);
    if (isNaN(timeout) || timeout < 1) {
      throw new ConfigError('VOCAB_VALIDATOR_TIMEOUT_MS', [
        `expected a positive integer, got '${env.VOCAB_VALIDATOR_TIMEOUT_MS}'`,
      ]);
    }
    result.timeoutMs = timeout;
  }

  return result;
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): ValidatorConfig {
  return { ...DEFAULT_CONFIG, skipRules: [...DEFAULT_CONFIG.skipRules] };
}

/**
 * Validate a fully assembled configuration
 */
export function validateConfig(config: ValidatorConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.timeoutMs) || config.timeoutMs < 1) {
    errors.push(`Invalid timeout: ${config.timeoutMs}. Must be a positive integer.`);
  }

  if (!/^https?:\/\//.test(config.registryUrl)) {
    errors.push(`Invalid registry URL: ${config.registryUrl}. Must be an http(s) URL.`);
  }

  if (!config.vocabularyRoot.endsWith('/')) {
    errors.push(`Invalid vocabulary root: ${config.vocabularyRoot}. Must end with '/'.`);
  }

  return errors;
}
