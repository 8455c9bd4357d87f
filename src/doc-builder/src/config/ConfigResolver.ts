/**
 * ConfigResolver - Builds the immutable run configuration.
 *
 * Sources, lowest to highest precedence:
 * - built-in defaults
 * - .docsmithrc / .docsmithrc.yml / .docsmithrc.yaml / .docsmithrc.json
 * - .env files in the project root
 * - process environment (DOCSMITH_*, GROQ_API_KEY, OLLAMA_BASE_URL)
 * - command-line flags
 *
 * Every value is validated; a bad one raises ConfigError naming the key
 * and the source it came from.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { DocstringStyle, PipelineConfig, ProviderName, isDocstringStyle } from '../types';
import { ConfigError, errorMessage } from '../core/errors';

const DEFAULTS: PipelineConfig = {
  style: 'google',
  threshold: 0.8,
  maxIterations: 3,
  overwrite: false,
  concurrency: 4,
  elementConcurrency: 1,
  fileTimeoutMs: 300000, // 5 minutes
  provider: 'none',
  requestTimeoutMs: 60000,
  maxRetries: 2,
  include: ['**/*.py'],
  exclude: ['**/node_modules/**', '**/.venv/**', '**/venv/**', '**/__pycache__/**', '**/.git/**'],
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = Object.freeze(DEFAULTS);

export const RC_FILES = ['.docsmithrc', '.docsmithrc.yml', '.docsmithrc.yaml', '.docsmithrc.json'];

const ENV_FILES = ['.env', '.env.local'];

/** Environment variable -> config key */
export const ENV_KEYS: Readonly<Record<string, keyof PipelineConfig>> = {
  DOCSMITH_STYLE: 'style',
  DOCSMITH_THRESHOLD: 'threshold',
  DOCSMITH_MAX_ITERATIONS: 'maxIterations',
  DOCSMITH_OVERWRITE: 'overwrite',
  DOCSMITH_CONCURRENCY: 'concurrency',
  DOCSMITH_ELEMENT_CONCURRENCY: 'elementConcurrency',
  DOCSMITH_FILE_TIMEOUT_MS: 'fileTimeoutMs',
  DOCSMITH_PROVIDER: 'provider',
  DOCSMITH_MODEL: 'model',
  DOCSMITH_BASE_URL: 'baseUrl',
  DOCSMITH_REQUEST_TIMEOUT_MS: 'requestTimeoutMs',
  DOCSMITH_MAX_RETRIES: 'maxRetries',
  DOCSMITH_INCLUDE: 'include',
  DOCSMITH_EXCLUDE: 'exclude',
  GROQ_API_KEY: 'apiKey',
  OLLAMA_BASE_URL: 'baseUrl',
};

const CONFIG_KEYS: ReadonlyArray<keyof PipelineConfig> = [
  'style',
  'threshold',
  'maxIterations',
  'overwrite',
  'concurrency',
  'elementConcurrency',
  'fileTimeoutMs',
  'provider',
  'model',
  'apiKey',
  'baseUrl',
  'requestTimeoutMs',
  'maxRetries',
  'include',
  'exclude',
];

type ConfigValues = Partial<Record<keyof PipelineConfig, unknown>>;

export interface ConfigLayer {
  /** Where the values came from, e.g. a file name or 'cli' */
  source: string;
  values: ConfigValues;
}

export interface ConfigResolverOptions {
  /** Directory searched for rc and .env files */
  projectPath: string;
  /** Explicit rc file; replaces the search */
  rcPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedPipelineConfig {
  config: PipelineConfig;
  /** Source of each value that did not come from the defaults */
  sources: Partial<Record<keyof PipelineConfig, string>>;
}

// ============================================================================
// Value parsers (undefined = rejected)
// ============================================================================

function parseNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function parseInteger(min: number): (value: unknown) => number | undefined {
  return (value) => {
    const parsed = parseNumber(value);
    return parsed !== undefined && Number.isInteger(parsed) && parsed >= min ? parsed : undefined;
  };
}

function parseBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(lowered)) return true;
    if (['false', '0', 'no', 'off'].includes(lowered)) return false;
  }
  return undefined;
}

function parseString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function parseList(value: unknown): readonly string[] | undefined {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }
  if (Array.isArray(value) && value.every((item) => typeof item === 'string')) {
    return value.map((item: string) => item.trim()).filter((item) => item !== '');
  }
  return undefined;
}

function isProvider(value: string): value is ProviderName {
  return value === 'none' || value === 'groq' || value === 'ollama';
}

const EXPECTED: Record<keyof PipelineConfig, string> = {
  style: 'one of google, numpy, rst',
  threshold: 'a number >= 0',
  maxIterations: 'an integer >= 1',
  overwrite: 'a boolean',
  concurrency: 'an integer >= 1',
  elementConcurrency: 'an integer >= 1',
  fileTimeoutMs: 'an integer >= 1',
  provider: 'one of none, groq, ollama',
  model: 'a non-empty string',
  apiKey: 'a non-empty string',
  baseUrl: 'a non-empty string',
  requestTimeoutMs: 'an integer >= 1',
  maxRetries: 'an integer >= 0',
  include: 'a list of glob patterns',
  exclude: 'a list of glob patterns',
};

function isConfigKey(key: string): key is keyof PipelineConfig {
  return CONFIG_KEYS.some((k) => k === key);
}

function parseStyle(value: unknown): DocstringStyle | undefined {
  const text = parseString(value)?.toLowerCase();
  return text !== undefined && isDocstringStyle(text) ? text : undefined;
}

function parseThreshold(value: unknown): number | undefined {
  const parsed = parseNumber(value);
  return parsed !== undefined && parsed >= 0 ? parsed : undefined;
}

function parseProvider(value: unknown): ProviderName | undefined {
  const text = parseString(value)?.toLowerCase();
  return text !== undefined && isProvider(text) ? text : undefined;
}

/**
 * Merge layers over the defaults, later layers winning.
 */
export function mergeConfigLayers(layers: readonly ConfigLayer[]): ResolvedPipelineConfig {
  const sources: Partial<Record<keyof PipelineConfig, string>> = {};

  // Every layer's value is validated, even when a later layer replaces it
  const read = <T>(key: keyof PipelineConfig, parse: (value: unknown) => T | undefined, fallback: T): T => {
    let result = fallback;
    for (const layer of layers) {
      const raw = layer.values[key];
      if (raw === undefined || raw === null) continue;
      const parsed = parse(raw);
      if (parsed === undefined) {
        throw new ConfigError(
          `Invalid value for '${key}' from ${layer.source}: expected ${EXPECTED[key]}`,
          key,
          layer.source
        );
      }
      result = parsed;
      sources[key] = layer.source;
    }
    return result;
  };

  const config: PipelineConfig = {
    style: read('style', parseStyle, DEFAULTS.style),
    threshold: read('threshold', parseThreshold, DEFAULTS.threshold),
    maxIterations: read('maxIterations', parseInteger(1), DEFAULTS.maxIterations),
    overwrite: read('overwrite', parseBoolean, DEFAULTS.overwrite),
    concurrency: read('concurrency', parseInteger(1), DEFAULTS.concurrency),
    elementConcurrency: read('elementConcurrency', parseInteger(1), DEFAULTS.elementConcurrency),
    fileTimeoutMs: read('fileTimeoutMs', parseInteger(1), DEFAULTS.fileTimeoutMs),
    provider: read('provider', parseProvider, DEFAULTS.provider),
    model: read('model', parseString, DEFAULTS.model),
    apiKey: read('apiKey', parseString, DEFAULTS.apiKey),
    baseUrl: read('baseUrl', parseString, DEFAULTS.baseUrl),
    requestTimeoutMs: read('requestTimeoutMs', parseInteger(1), DEFAULTS.requestTimeoutMs),
    maxRetries: read('maxRetries', parseInteger(0), DEFAULTS.maxRetries),
    include: read('include', parseList, DEFAULTS.include),
    exclude: read('exclude', parseList, DEFAULTS.exclude),
  };

  if (config.provider === 'groq' && !config.apiKey) {
    throw new ConfigError('GROQ_API_KEY is required when the provider is groq', 'apiKey', sources.provider ?? 'defaults');
  }

  return { config: Object.freeze(config), sources };
}

/**
 * Parse .env content into KEY -> value pairs.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const line of content.split(/\r\n|\r|\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) continue;

    const key = trimmed.substring(0, eqIndex).replace(/^export\s+/, '').trim();
    let value = trimmed.substring(eqIndex + 1).trim();

    // Remove quotes
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    vars[key] = value;
  }
  return vars;
}

/**
 * Config keys present in a set of environment variables.
 */
export function envLayerValues(env: Readonly<Record<string, string | undefined>>): ConfigValues {
  const values: ConfigValues = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }
  return values;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigResolver {
  constructor(private options: ConfigResolverOptions) {}

  /**
   * Resolve the configuration with CLI flags as the top layer.
   */
  async resolve(flags: ConfigValues = {}): Promise<PipelineConfig> {
    return (await this.resolveWithSources(flags)).config;
  }

  async resolveWithSources(flags: ConfigValues = {}): Promise<ResolvedPipelineConfig> {
    const layers: ConfigLayer[] = [];

    const rc = await this.loadRcFile();
    if (rc) layers.push(rc);

    const dotenv = await this.loadEnvFiles();
    if (Object.keys(dotenv.values).length > 0) layers.push(dotenv);

    layers.push({ source: 'environment', values: envLayerValues(this.options.env ?? process.env) });
    layers.push({ source: 'cli', values: flags });

    return mergeConfigLayers(layers);
  }

  /**
   * First rc file found, parsed with js-yaml (JSON is valid YAML).
   */
  private async loadRcFile(): Promise<ConfigLayer | undefined> {
    const candidates = this.options.rcPath
      ? [path.resolve(this.options.rcPath)]
      : RC_FILES.map((name) => path.join(this.options.projectPath, name));

    for (const filePath of candidates) {
      let content: string;
      try {
        content = await fs.readFile(filePath, 'utf-8');
      } catch (error) {
        // Missing file: try the next name
        if (isMissingFile(error) && !this.options.rcPath) continue;
        throw new ConfigError(`Cannot read config file: ${errorMessage(error)}`, 'file', filePath);
      }
      return { source: path.basename(filePath), values: this.parseRcContent(content, filePath) };
    }
    return undefined;
  }

  private parseRcContent(content: string, filePath: string): ConfigValues {
    let data: unknown;
    try {
      data = yaml.load(content);
    } catch (error) {
      throw new ConfigError(`Invalid config file: ${errorMessage(error)}`, 'file', filePath);
    }
    if (data === undefined || data === null) return {};
    if (!isPlainObject(data)) {
      throw new ConfigError('Config file must contain a mapping', 'file', filePath);
    }

    const values: ConfigValues = {};
    for (const [key, value] of Object.entries(data)) {
      if (isConfigKey(key)) {
        values[key] = value;
      } else {
        console.warn(`Ignoring unknown config key '${key}' in ${path.basename(filePath)}`);
      }
    }
    return values;
  }

  private async loadEnvFiles(): Promise<ConfigLayer> {
    const merged: Record<string, string> = {};
    for (const filename of ENV_FILES) {
      const filePath = path.join(this.options.projectPath, filename);
      try {
        const content = await fs.readFile(filePath, 'utf-8');
        Object.assign(merged, parseEnvFile(content));
      } catch (error) {
        // File doesn't exist, skip
        if (!isMissingFile(error)) {
          throw new ConfigError(`Cannot read ${filename}: ${errorMessage(error)}`, 'file', filePath);
        }
      }
    }
    return { source: '.env', values: envLayerValues(merged) };
  }
}
