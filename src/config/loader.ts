import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import { ConfigurationSchema, SecretStoreBootstrapSchema } from './types.js';
import type { Configuration, SecretStoreBootstrap } from './types.js';
import logger from './logger.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function loadConfig(configPath: string): Configuration {
  try {
    const fileContents = readFileSync(configPath, 'utf8');
    // An empty YAML document loads as undefined
    const config = ConfigurationSchema.parse(yaml.load(fileContents) ?? {});

    logger.info({ configPath }, 'Configuration loaded successfully');
    return config;
  } catch (error) {
    logger.error({ error: describe(error), configPath }, 'Failed to load configuration');
    throw new Error(`Failed to load configuration from ${configPath}: ${describe(error)}`);
  }
}

/**
 * Like loadConfig, but a missing file yields the defaults.
 */
export function loadConfigOrDefaults(configPath: string): Configuration {
  try {
    readFileSync(configPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.info({ configPath }, 'No configuration file, using defaults');
      return ConfigurationSchema.parse({});
    }
  }
  return loadConfig(configPath);
}

export function loadSecretStoreBootstrap(bootstrapPath: string): SecretStoreBootstrap {
  try {
    const fileContents = readFileSync(bootstrapPath, 'utf8');
    return SecretStoreBootstrapSchema.parse(JSON.parse(fileContents));
  } catch (error) {
    logger.error({ error: describe(error), bootstrapPath }, 'Failed to load secret store bootstrap');
    throw new Error(`Failed to load secret store bootstrap from ${bootstrapPath}: ${describe(error)}`);
  }
}
