import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema, formatConfigError, type AppConfig } from './schema.js';
import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';

const log = createLogger('Config');

const ENV_REF_REGEX = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Replace `${VAR}` references in every string of a parsed YAML tree.
 * Unset variables are an error so that a missing secret never reaches the broker as "".
 */
export function resolveEnvReferences(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REF_REGEX, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigError(`Environment variable '${name}' is referenced in config but not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvReferences(item, env));
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = resolveEnvReferences(v, env);
    }
    return out;
  }
  return value;
}

/** Parse and validate YAML text. Throws ConfigError with a formatted message. */
export function parseConfig(
  raw: string,
  source: string = 'config.yaml',
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Cannot parse ${source}: ${errMsg(err)}`);
  }

  if (parsed === null || typeof parsed !== 'object') {
    throw new ConfigError(`${source} is not a valid YAML object`);
  }

  const result = AppConfigSchema.safeParse(resolveEnvReferences(parsed, env));
  if (!result.success) {
    throw new ConfigError(formatConfigError(result.error, source));
  }
  return result.data;
}

export function loadConfigFile(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${errMsg(err)}`);
  }

  const config = parseConfig(raw, configPath);
  const people = config.scales.reduce((sum, s) => sum + s.people.length, 0);
  log.debug(`Loaded ${configPath}: ${config.scales.length} scale(s), ${people} person(s)`);
  return config;
}
