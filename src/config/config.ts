/**
 * Config Loader
 *
 * Reads config/genegraph.json (or the file named by GENEGRAPH_CONFIG),
 * substitutes {env:VAR} references and validates the result. Parsing
 * throws ConfigError; only getConfig turns that into a process exit.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type Config, configSchema } from './schema';

const DEFAULT_CONFIG_PATH = 'config/genegraph.json';
const ENV_REFERENCE = /\{env:([A-Z_][A-Z0-9_]*)\}/g;

export class ConfigError extends Error {
  constructor(
    message: string,
    /** One line per validation issue */
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Unset variables resolve to the empty string.
 */
export function resolveEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(ENV_REFERENCE, (_, name: string) => env[name] ?? '');
}

/**
 * Validate raw config text. `source` names the file in error messages.
 */
export function parseConfig(text: string, source: string, env: NodeJS.ProcessEnv = process.env): Config {
  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text, env));
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${source}`);
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(
      `Invalid config: ${source}`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

function readConfigFile(configPath: string): string {
  try {
    return readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`, [
        'Copy config/genegraph.example.json to config/genegraph.json and configure it.'
      ]);
    }
    throw err;
  }
}

let cachedConfig: Config | null = null;

/**
 * Load once and cache. Exits the process when the config is unusable.
 */
export function getConfig(): Config {
  if (cachedConfig) return cachedConfig;

  const configPath = process.env['GENEGRAPH_CONFIG'] ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
  try {
    cachedConfig = parseConfig(readConfigFile(configPath), configPath);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(err.message);
    for (const issue of err.issues) console.error(`  ${issue}`);
    process.exit(1);
  }
  return cachedConfig;
}
