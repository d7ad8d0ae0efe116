/**
 * config.ts
 * Configuration loading: defaults, optional JSON/YAML file, then environment overrides
 */

import fs from 'fs/promises';
import path from 'path';

import { logger } from '../utils/logger.js';

import { applyEnvOverrides } from './envMapper.js';
import { validateConfig, type AppConfig } from './schema.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a JSON or YAML configuration file into a plain object
 */
export async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  const resolvedPath = path.resolve(filePath);
  const content = await fs.readFile(resolvedPath, 'utf-8');
  const ext = path.extname(resolvedPath).toLowerCase();

  let parsed: unknown;
  if (ext === '.json') {
    parsed = JSON.parse(content);
  } else if (ext === '.yaml' || ext === '.yml') {
    // Dynamic import to avoid loading yaml if not used
    const yaml = await import('js-yaml');
    parsed = yaml.load(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}. Use .json, .yaml, or .yml`);
  }

  if (!isRecord(parsed)) {
    throw new Error(`Configuration file ${resolvedPath} must contain an object`);
  }

  logger.info(`Configuration loaded from ${resolvedPath}`);
  return parsed;
}

export interface LoadConfigOptions {
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build the validated application config.
 * @throws ConfigValidationError listing every invalid setting
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? env.QUEUE_CONFIG_FILE;

  const fromFile = filePath ? await readConfigFile(filePath) : {};
  return validateConfig(applyEnvOverrides(fromFile, env));
}
