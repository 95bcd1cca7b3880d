/**
 * @fileoverview Configuration loading
 *
 * Layers, lowest first:
 * - config/defaults.yaml shipped with the package
 * - the project file (`--config <path>` or `ruleweaver.config.yaml` in the cwd)
 * - RULEWEAVER_* environment variables
 *
 * The merged document is validated once and then treated as immutable.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import YAML from 'yaml';
import { ConfigurationError, ParseError, getErrorMessage } from '../core/errors.js';
import { RuleweaverConfigSchema, type RuleweaverConfig } from './schema.js';

export * from './schema.js';

export const DEFAULT_CONFIG_FILE = 'ruleweaver.config.yaml';
const DEFAULTS_PATH = fileURLToPath(new URL('../../config/defaults.yaml', import.meta.url));

type PlainObject = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given. */
  configPath?: string;
  /** Directory searched for ruleweaver.config.yaml. Defaults to process.cwd(). */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Extra values merged above the file and below the environment. */
  overrides?: PlainObject;
}

export interface LoadedConfig {
  config: RuleweaverConfig;
  /** File the project layer came from, if any. */
  source: string | null;
}

// ============================================================================
// MERGING
// ============================================================================

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Maps merge key by key; anything else in `override` replaces `base`. */
export function mergeConfigLayers(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfigLayers(base[key], value);
  }
  return merged;
}

// ============================================================================
// FILE LAYERS
// ============================================================================

function readYamlFile(filePath: string): PlainObject {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(filePath, `cannot read file: ${getErrorMessage(error)}`);
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ParseError('yaml', getErrorMessage(error), filePath);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(filePath, 'top level must be a mapping');
  }
  return parsed;
}

let cachedDefaults: PlainObject | null = null;

function readDefaults(): PlainObject {
  if (!cachedDefaults) {
    cachedDefaults = readYamlFile(DEFAULTS_PATH);
  }
  return cachedDefaults;
}

function resolveProjectFile(options: LoadConfigOptions): string | null {
  const cwd = options.cwd ?? process.cwd();
  if (options.configPath) {
    const explicit = path.resolve(cwd, options.configPath);
    if (!fs.existsSync(explicit)) {
      throw new ConfigurationError(explicit, 'config file not found');
    }
    return explicit;
  }
  const discovered = path.join(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(discovered) ? discovered : null;
}

// ============================================================================
// ENVIRONMENT LAYER
// ============================================================================

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new ConfigurationError(name, `expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  const backend: PlainObject = {};
  const knowledge: PlainObject = {};
  const rules: PlainObject = {};

  if (env.RULEWEAVER_LLM_PROVIDER) backend.provider = env.RULEWEAVER_LLM_PROVIDER.trim();
  if (env.RULEWEAVER_LLM_MODEL) backend.model = env.RULEWEAVER_LLM_MODEL.trim();
  if (env.RULEWEAVER_LLM_TIMEOUT_MS) {
    backend.timeoutMs = parsePositiveInt('RULEWEAVER_LLM_TIMEOUT_MS', env.RULEWEAVER_LLM_TIMEOUT_MS);
  }
  if (env.RULEWEAVER_KNOWLEDGE_DIR) knowledge.directory = env.RULEWEAVER_KNOWLEDGE_DIR;
  if (env.RULEWEAVER_REFRESH_INTERVAL_MS) {
    knowledge.refreshIntervalMs = parsePositiveInt('RULEWEAVER_REFRESH_INTERVAL_MS', env.RULEWEAVER_REFRESH_INTERVAL_MS);
  }
  if (env.RULEWEAVER_RULES_PATH) rules.path = env.RULEWEAVER_RULES_PATH;

  const layer: PlainObject = {};
  if (Object.keys(backend).length > 0) layer.backend = backend;
  if (Object.keys(knowledge).length > 0) layer.knowledge = knowledge;
  if (Object.keys(rules).length > 0) layer.rules = rules;
  return layer;
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate a configuration layer merged over the bundled defaults.
 * Relative paths are resolved against `baseDir`.
 */
export function parseConfig(layer: unknown = {}, baseDir: string = process.cwd()): RuleweaverConfig {
  const merged = mergeConfigLayers(readDefaults(), layer);
  const parsed = RuleweaverConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const first = parsed.error.errors[0];
    const key = first && first.path.length > 0 ? first.path.join('.') : 'config';
    const message = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || '/'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(key, message);
  }
  const config = parsed.data;
  return {
    ...config,
    knowledge: { ...config.knowledge, directory: path.resolve(baseDir, config.knowledge.directory) },
    rules: config.rules.path
      ? { ...config.rules, path: path.resolve(baseDir, config.rules.path) }
      : config.rules,
  };
}

export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const source = resolveProjectFile(options);
  const fileLayer = source ? readYamlFile(source) : {};
  const envLayer = configFromEnv(options.env ?? process.env);
  const layered = mergeConfigLayers(mergeConfigLayers(fileLayer, options.overrides ?? {}), envLayer);
  const baseDir = source ? path.dirname(source) : (options.cwd ?? process.cwd());
  return { config: parseConfig(layered, baseDir), source };
}
