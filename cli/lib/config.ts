import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import {
  DEFAULT_LIBRARY_DIR,
  DEFAULT_OUT_DIR,
  DEFAULT_SITE_LANG,
  DEFAULT_SITE_TITLE,
  ROM_EXTENSIONS,
  SIDECAR_FILE_NAME,
} from '../../src/lib/constants';
import { ConfigError, errorMessage, formatZodErrors, isErrnoException } from './types';
import { logger } from '../utils/logger';

/**
 * Zod schema for catalog configuration
 */
const CatalogConfigSchema = z.object({
  site: z.object({
    title: z.string().min(1).default(DEFAULT_SITE_TITLE),
    lang: z.string().min(1).default(DEFAULT_SITE_LANG),
  }).default({}),
  sidecar: z.object({
    fileName: z.string().min(1).default(SIDECAR_FILE_NAME),
    onMalformed: z.enum(['abort', 'skip']).default('abort'),
  }).default({}),
  media: z.object({
    autoDetect: z.boolean().default(true),
  }).default({}),
  romExtensions: z
    .array(z.string().regex(/^\.[^./\\]+$/, 'extensions start with a dot, e.g. ".nes"'))
    .min(1)
    .transform((extensions) => extensions.map((ext) => ext.toLowerCase()))
    .default([...ROM_EXTENSIONS]),
  paths: z.object({
    library: z.string().min(1).default(DEFAULT_LIBRARY_DIR),
    out: z.string().min(1).default(DEFAULT_OUT_DIR),
  }).default({}),
});

export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;

export interface ConfigLoadOptions {
  configDir?: string; // defaults to $CATALOG_CONFIG_DIR, then <cwd>/config
  optional?: boolean; // a missing file yields schema defaults
}

/**
 * Configuration manager for loading and validating config files
 */
export class ConfigManager {
  private static configCache: Map<string, unknown> = new Map();

  /**
   * Load and validate a configuration file
   */
  static async load<T>(
    configName: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ConfigLoadOptions = {}
  ): Promise<T> {
    const configPath = this.resolvePath(configName, options.configDir);

    let data = this.configCache.get(configPath);
    if (data === undefined) {
      data = await this.readConfigFile(configName, configPath, options.optional ?? false);
      this.configCache.set(configPath, data);
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed for ${configName}:\n${formatZodErrors(result.error)}`,
        configName
      );
    }
    return result.data;
  }

  /**
   * Load catalog configuration (optional: defaults apply without a file)
   */
  static async loadCatalogConfig(configDir?: string): Promise<CatalogConfig> {
    return this.load('catalog.config', CatalogConfigSchema, { configDir, optional: true });
  }

  /**
   * Clear configuration cache
   */
  static clearCache(): void {
    this.configCache.clear();
  }

  private static resolvePath(configName: string, configDir?: string): string {
    const dir = configDir ?? process.env.CATALOG_CONFIG_DIR ?? path.join(process.cwd(), 'config');
    return path.resolve(dir, `${configName}.json`);
  }

  private static async readConfigFile(
    configName: string,
    configPath: string,
    optional: boolean
  ): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        if (optional) {
          logger.debug(`No ${configName}.json found, using defaults`, { configPath });
          return {};
        }
        throw new ConfigError(`Configuration file not found: ${configPath}`, configName);
      }
      throw new ConfigError(`Failed to load configuration ${configName}: ${errorMessage(error)}`, configName);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error: unknown) {
      throw new ConfigError(`Invalid JSON in ${configPath}: ${errorMessage(error)}`, configName);
    }

    return this.replaceEnvVars(data, configName);
  }

  /**
   * Replace ${VAR_NAME} placeholders with process.env.VAR_NAME
   */
  private static replaceEnvVars(value: unknown, configName: string): unknown {
    if (typeof value === 'string') {
      return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
        const envValue = process.env[varName];
        if (envValue === undefined) {
          throw new ConfigError(`Environment variable ${varName} is not defined`, configName);
        }
        return envValue;
      });
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.replaceEnvVars(item, configName));
    }

    if (value !== null && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.replaceEnvVars(item, configName);
      }
      return result;
    }

    return value;
  }
}

export { CatalogConfigSchema };
