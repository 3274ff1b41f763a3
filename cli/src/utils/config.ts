/**
 * CLI Config File
 *
 * Optional YAML file with defaults for every command:
 *
 * ```yaml
 * format: json
 * color: false
 * logLevel: warn
 * excludedChildTypes: [ToolContainer, BrowseV2, TextComment]
 * strictScope: true
 * ```
 *
 * Looked up at `--config <file>` or, when that flag is absent,
 * `yxgraph.config.yaml` in the working directory. Command-line flags win
 * over the file.
 *
 * @module utils
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve } from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, describeZodIssues, type GraphEngineConfig } from '@yxgraph/engine';
import type { CliCommonOptions, OutputFormat } from '../types/CliCommonOptions.js';

export const DEFAULT_CONFIG_FILE = 'yxgraph.config.yaml';

export const CliConfigSchema = z
  .object({
    format: z.enum(['human', 'json']).optional(),
    color: z.boolean().optional(),
    verbose: z.boolean().optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    logFormat: z.enum(['text', 'pretty', 'json']).optional(),
    excludedChildTypes: z.array(z.string().trim().min(1)).optional(),
    strictScope: z.boolean().optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Options after merging flags over the config file
 */
export interface ResolvedCliOptions {
  format: OutputFormat;
  noColor: boolean;
  verbose: boolean;
  engine: GraphEngineConfig;
}

/**
 * Read and validate the config file. A missing default file means no
 * config; a missing explicit `--config` file is an error.
 *
 * @throws ConfigError
 */
export async function loadCliConfig(configPath?: string, cwd: string = process.cwd()): Promise<CliConfig> {
  const path = resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(path)) {
    if (configPath !== undefined) {
      throw new ConfigError(`Config file not found: ${configPath}`, { path });
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = YAML.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Invalid config file ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      path,
    });
  }

  // An empty file parses to null
  const result = CliConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${path}`, { path, issues: describeZodIssues(result.error) });
  }
  return result.data;
}

/**
 * Merge command-line flags over the config file
 */
export function resolveCliOptions(options: CliCommonOptions, config: CliConfig): ResolvedCliOptions {
  const verbose = options.verbose ?? config.verbose ?? false;
  const color = options.color === false ? false : (config.color ?? true);

  return {
    format: options.format ?? config.format ?? 'human',
    noColor: !color,
    verbose,
    engine: {
      logLevel: verbose ? 'debug' : (config.logLevel ?? 'warn'),
      logFormat: config.logFormat ?? 'text',
      colors: color,
      ...(config.excludedChildTypes !== undefined && { excludedChildTypes: config.excludedChildTypes }),
      ...(config.strictScope !== undefined && { strictScope: config.strictScope }),
    },
  };
}
