import { existsSync, readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError, describeError } from './errors';
import { logWarn } from './logger';
import { type Options, optionsSchema } from './options.schema';

export const DEFAULT_CONFIG_FILE = 'default_config.json';
export const USER_CONFIG_FILE = 'config.json';

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Recursively merge `override` into a copy of `base`. Nested objects merge key by key,
 * everything else (arrays included) is replaced.
 */
export const mergeOptions = (base: PlainObject, override: PlainObject): PlainObject => {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeOptions(current, value) : value;
  }
  return merged;
};

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

export const parseOptions = (raw: unknown): Options => {
  const result = optionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(result.error));
  }
  return result.data;
};

const readJsonFile = (path: string): PlainObject => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Error reading or parsing ${path}: ${describeError(error)}`, [], { cause: error });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`${path} must contain a JSON object`);
  }
  return parsed;
};

export interface LoadOptionsParams {
  /** User config file, overrides the default file. */
  configFile?: string;
  defaultConfigFile?: string;
  /** Highest precedence, typically from the command line. */
  overrides?: PlainObject;
}

/**
 * Built-in defaults, then `default_config.json`, then the user file, then `overrides`.
 * Missing files are skipped; unreadable or invalid ones raise `ConfigurationError`.
 */
export const loadOptions = ({
  configFile = USER_CONFIG_FILE,
  defaultConfigFile = DEFAULT_CONFIG_FILE,
  overrides = {},
}: LoadOptionsParams = {}): Options => {
  let raw: PlainObject = {};
  for (const file of [defaultConfigFile, configFile]) {
    if (existsSync(file)) raw = mergeOptions(raw, readJsonFile(file));
  }
  return parseOptions(mergeOptions(raw, overrides));
};

/**
 * Persist settings (including the chosen microphone indices). Returns false instead
 * of throwing: failing to save must not stop a running monitor.
 */
export const saveOptions = (options: Options, configFile = USER_CONFIG_FILE): boolean => {
  try {
    writeFileSync(configFile, `${JSON.stringify(options, null, 2)}\n`, 'utf8');
    return true;
  } catch (error) {
    logWarn(`[Config] Failed to save ${configFile}: ${describeError(error)}`);
    return false;
  }
};

/**
 * Write the built-in defaults to `default_config.json` unless it already exists.
 */
export const createDefaultConfigFile = (defaultConfigFile = DEFAULT_CONFIG_FILE): boolean => {
  if (existsSync(defaultConfigFile)) return false;
  const { microphones: _microphones, ...defaults } = parseOptions({});
  try {
    writeFileSync(defaultConfigFile, `${JSON.stringify(defaults, null, 2)}\n`, 'utf8');
    return true;
  } catch (error) {
    logWarn(`[Config] Failed to create ${defaultConfigFile}: ${describeError(error)}`);
    return false;
  }
};
