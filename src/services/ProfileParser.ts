import { parse as parseYaml } from 'yaml';
import type { ConnectionProfile, Dialect, EncryptionMode, EnvironmentRecord } from '../types';
import { ConnectionStringError, InvalidProfileError } from '../types';

const COMMON_KEYS = [
  'name',
  'dialect',
  'username',
  'password',
  'host',
  'port',
  'database',
  'connect_timeout',
  'parameters',
];

const SQLSERVER_KEYS = [
  'command_timeout',
  'connect_retry_count',
  'connect_retry_interval',
  'encryption',
];

const ENCRYPTION_MODES: readonly EncryptionMode[] = ['none', 'enabled', 'trust_server_certificate'];

const INTEGER_PATTERN = /^-?\d+$/;
const VARIABLE_PATTERN = /\$\$|\$\{([^}]+)\}/g;

type RawProfile = Record<string, unknown>;

/**
 * ProfileParser - Parses connection profiles from YAML (or JSON) text
 *
 * Supports:
 * - `${VAR}` substitution in string values, with `$$` for a literal `$`
 * - scalars kept as written (failsafe schema), so `0123` stays `0123`
 * - dialect-specific option checks
 */
export class ProfileParser {
  private readonly env: EnvironmentRecord;

  constructor(env: EnvironmentRecord = {}) {
    this.env = env;
  }

  /**
   * Parse and validate a connection profile
   */
  parse(content: string): ConnectionProfile {
    let data: unknown;
    try {
      data = parseYaml(content, { schema: 'failsafe' });
    } catch (error) {
      throw new ConnectionStringError(
        `Failed to parse connection profile: ${error instanceof Error ? error.message : 'Unknown error'}`,
        'PROFILE_PARSE_ERROR'
      );
    }

    const substituted = this.substituteEnvironmentVariables(data);
    if (!isRecord(substituted)) {
      throw new InvalidProfileError('Connection profile must be a mapping');
    }

    return this.normalize(substituted);
  }

  private normalize(raw: RawProfile): ConnectionProfile {
    const dialect = raw['dialect'];
    if (!isDialect(dialect)) {
      throw new InvalidProfileError(
        `Unsupported dialect: ${String(dialect ?? 'missing')}. Expected 'postgres' or 'sqlserver'`,
        'dialect'
      );
    }

    const allowedKeys = dialect === 'sqlserver' ? [...COMMON_KEYS, ...SQLSERVER_KEYS] : COMMON_KEYS;
    for (const key of Object.keys(raw)) {
      if (!allowedKeys.includes(key)) {
        throw new InvalidProfileError(`Unknown option for ${dialect} profile: ${key}`, key);
      }
    }

    const username = optionalString(raw, 'username');
    const password = optionalString(raw, 'password');
    const host = optionalString(raw, 'host');
    const port = optionalInteger(raw, 'port');

    if (password !== undefined && username === undefined) {
      throw new InvalidProfileError('password requires username', 'password');
    }
    if (port !== undefined && host === undefined) {
      throw new InvalidProfileError('port requires host', 'port');
    }

    const base = {
      name: optionalString(raw, 'name'),
      username,
      password,
      host,
      port,
      database: optionalString(raw, 'database'),
      connectTimeout: optionalInteger(raw, 'connect_timeout'),
      parameters: parseParameters(raw['parameters']),
    };

    if (dialect === 'postgres') {
      return { dialect, ...base };
    }

    return {
      dialect,
      ...base,
      commandTimeout: optionalInteger(raw, 'command_timeout'),
      connectRetryCount: optionalInteger(raw, 'connect_retry_count'),
      connectRetryInterval: optionalInteger(raw, 'connect_retry_interval'),
      encryption: parseEncryption(raw['encryption']),
    };
  }

  /**
   * Replace ${VAR_NAME} in string values and `$$` with `$`; unknown variables are kept verbatim
   */
  private substituteEnvironmentVariables(data: unknown): unknown {
    if (typeof data === 'string') {
      return data.replace(VARIABLE_PATTERN, (match, name: string | undefined) => {
        if (name === undefined) {
          return '$';
        }
        return this.env[name] ?? match;
      });
    }

    if (Array.isArray(data)) {
      return data.map((item) => this.substituteEnvironmentVariables(item));
    }

    if (isRecord(data)) {
      // fromEntries defines own properties, so keys such as `__proto__` survive
      return Object.fromEntries(
        Object.entries(data).map(([key, value]) => [key, this.substituteEnvironmentVariables(value)])
      );
    }

    return data;
  }
}

function isDialect(value: unknown): value is Dialect {
  return value === 'postgres' || value === 'sqlserver';
}

function isRecord(value: unknown): value is RawProfile {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: RawProfile, field: string): string | undefined {
  const value = raw[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  throw new InvalidProfileError(`${field} must be a string`, field);
}

function optionalInteger(raw: RawProfile, field: string): number | undefined {
  const value = raw[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  throw new InvalidProfileError(`${field} must be an integer`, field);
}

function parseParameters(value: unknown): Record<string, string> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new InvalidProfileError('parameters must be a mapping', 'parameters');
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => {
      if (typeof entry !== 'string') {
        throw new InvalidProfileError(`parameters.${key} must be a scalar value`, 'parameters');
      }
      return [key, entry];
    })
  );
}

function parseEncryption(value: unknown): EncryptionMode {
  if (value === undefined || value === null) {
    return 'none';
  }
  const mode = ENCRYPTION_MODES.find((candidate) => candidate === value);
  if (mode === undefined) {
    throw new InvalidProfileError(
      `encryption must be one of: ${ENCRYPTION_MODES.join(', ')}`,
      'encryption'
    );
  }
  return mode;
}
