/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (HIX_HOME or ~/.hix)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { AnyJson, JsonMap } from '@iarna/toml';
import type { z } from 'zod';

import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function isJsonMap(value: AnyJson | undefined): value is JsonMap {
  return isPlainObject(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Arrays and primitives are replaced, nested objects are merged.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

/**
 * Read and parse config.toml, or null when it doesn't exist.
 */
function readConfigFile(configPath: string): JsonMap | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: hix config reset`
    );
  }
}

/**
 * Load the config file and merge it over the defaults.
 *
 * @param createIfMissing - Write the commented template on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();
  const parsed = readConfigFile(configPath);

  if (parsed === null) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  // Sparse files are fine; wrong types are not
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error)}`,
      'Run: hix config reset  to restore defaults'
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(structuredClone(DEFAULT_CONFIG), partial.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error)}`,
      'Run: hix config reset  to restore defaults'
    );
  }

  return merged.data;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('chunking.target_tokens') => 500
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();

  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path.
 * The whole merged config is validated before the file is written.
 */
export function setConfigValue(key: string, value: string): void {
  const configPath = getConfigPath();
  const parts = key.split('.').filter(Boolean);
  const lastPart = parts.pop();

  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  const config: JsonMap = readConfigFile(configPath) ?? {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // An unknown key would be silently dropped by the schema; reject it instead
  if (getPathValue(DEFAULT_CONFIG, [...parts, lastPart]) === undefined && !isOptionalKey(key)) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const validationResult = ConfigSchema.safeParse(deepMerge(structuredClone(DEFAULT_CONFIG), config));
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error)}`,
      'Run: hix config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Overwrite config.toml with the default template.
 */
export function resetConfig(): string {
  const configPath = getConfigPath();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return configPath;
}

/** Keys that are valid but have no default value */
const OPTIONAL_KEYS = new Set(['embedding.base_url']);

function isOptionalKey(key: string): boolean {
  return OPTIONAL_KEYS.has(key);
}

function getPathValue(source: unknown, parts: string[]): unknown {
  let current = source;
  for (const part of parts) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['chunking.target_tokens', 500]
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
