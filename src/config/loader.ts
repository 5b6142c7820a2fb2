import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { TwinpaneConfigSchema, type TwinpaneConfig } from './schema.js';
import { CONFIG_FILE_NAMES } from './defaults.js';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface CLIOptions {
  config?: string;
  // String versions of numeric fields (from commander)
  lookahead?: string;
  binaryProbeBytes?: string;
  // Direct overrides matching schema fields
  closeGuard?: string;
  output?: string;
  exclude?: string[];
  showHidden?: boolean;
  preserveTimestamps?: boolean;
  verbose?: boolean;
}

function findConfigFile(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    for (const name of CONFIG_FILE_NAMES) {
      const filePath = path.join(dir, name);
      if (fs.existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function loadConfigFile(filePath: string): Record<string, unknown> {
  const content = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = filePath.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse config file ${filePath}: ${message}`, { cause: err });
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain an object`);
  }
  return { ...parsed };
}

export async function loadConfig(cliOpts: CLIOptions = {}): Promise<TwinpaneConfig> {
  // Load config file
  let fileConfig: Record<string, unknown> = {};
  const configPath = cliOpts.config ?? findConfigFile(process.cwd());
  if (configPath && fs.existsSync(configPath)) {
    fileConfig = loadConfigFile(configPath);
  }

  // CLI options override file config
  const merged = {
    ...fileConfig,
    ...(cliOpts.lookahead !== undefined && { lookahead: parseInt(cliOpts.lookahead, 10) }),
    ...(cliOpts.binaryProbeBytes !== undefined && {
      binaryProbeBytes: parseInt(cliOpts.binaryProbeBytes, 10),
    }),
    ...(cliOpts.closeGuard !== undefined && { closeGuard: cliOpts.closeGuard }),
    ...(cliOpts.output !== undefined && { output: cliOpts.output }),
    ...(cliOpts.exclude !== undefined && { exclude: cliOpts.exclude }),
    ...(cliOpts.showHidden !== undefined && { showHidden: cliOpts.showHidden }),
    ...(cliOpts.preserveTimestamps !== undefined && {
      preserveTimestamps: cliOpts.preserveTimestamps,
    }),
    ...(cliOpts.verbose && { logLevel: 'debug' }),
  };

  // Validate
  return TwinpaneConfigSchema.parse(merged);
}
