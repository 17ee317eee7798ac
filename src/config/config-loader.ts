/**
 * Configuration Loader
 *
 * Reads the shipped `config/default.yaml`, merges an optional user YAML file
 * over it and validates the result. Relative directories in a user file are
 * resolved against that file's directory; the built-in ones against the cwd.
 */

import * as fs from 'fs';
import * as path from 'path';

import * as yaml from 'js-yaml';

import { FlashcardConfig, flashcardConfigSchema } from '../models/config.model';
import { ConfigError, describeError } from '../models/errors';

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../config/default.yaml');

export interface LoadConfigOptions {
  /** User config merged over the defaults */
  configPath?: string;

  /** Override for the built-in defaults file */
  defaultsPath?: string;

  /** Base for relative paths when no user file is given */
  cwd?: string;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base`; arrays and scalars replace, objects recurse
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

function readYamlFile(filePath: string): PlainObject {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${filePath}: ${describeError(err)}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Load, merge and validate the configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): FlashcardConfig {
  const defaults = readYamlFile(options.defaultsPath ?? DEFAULT_CONFIG_PATH);
  const user = options.configPath ? readYamlFile(options.configPath) : {};

  const result = flashcardConfigSchema.safeParse(deepMerge(defaults, user));
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const baseDir = options.configPath
    ? path.dirname(path.resolve(options.configPath))
    : (options.cwd ?? process.cwd());

  const config = result.data;
  return {
    ...config,
    paths: {
      questionsDir: path.resolve(baseDir, config.paths.questionsDir),
      logDir: path.resolve(baseDir, config.paths.logDir),
      exportDir: path.resolve(baseDir, config.paths.exportDir),
    },
  };
}
