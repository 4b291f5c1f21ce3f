// Supported connection string dialects
export type Dialect = 'postgres' | 'sqlserver';

// Credential and network location pairs
export interface UsernamePassword {
  readonly username: string;
  readonly password: string;
}

export interface HostPort {
  readonly host: string;
  readonly port: number;
}

// The `userspec` part of a URI-style connection string
export type UserSpec =
  | { readonly kind: 'username'; readonly username: string }
  | ({ readonly kind: 'username-password' } & UsernamePassword);

// The `hostspec` part of a URI-style connection string
export type HostSpec =
  | { readonly kind: 'host'; readonly host: string }
  | ({ readonly kind: 'host-port' } & HostPort);

export type EncryptionMode = 'none' | 'enabled' | 'trust_server_certificate';

// Connection profile shared by both dialects
interface BaseConnectionProfile {
  name?: string;
  username?: string;
  password?: string;
  host?: string;
  port?: number;
  database?: string;
  connectTimeout?: number;
  parameters: Record<string, string>;
}

export interface PostgresConnectionProfile extends BaseConnectionProfile {
  dialect: 'postgres';
}

export interface SqlServerConnectionProfile extends BaseConnectionProfile {
  dialect: 'sqlserver';
  commandTimeout?: number;
  connectRetryCount?: number;
  connectRetryInterval?: number;
  encryption: EncryptionMode;
}

export type ConnectionProfile = PostgresConnectionProfile | SqlServerConnectionProfile;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Runtime settings resolved from the process environment
export interface RuntimeConfig {
  environment: string;
  logLevel: LogLevel;
}

export type EnvironmentRecord = Record<string, string | undefined>;

// Error types
export type ConnectionStringErrorCode = 'INVALID_ARGUMENT' | 'PROFILE_PARSE_ERROR' | 'INVALID_PROFILE';

export class ConnectionStringError extends Error {
  constructor(
    message: string,
    public code: ConnectionStringErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConnectionStringError';
  }
}

export class InvalidArgumentError extends ConnectionStringError {
  constructor(argument: string, value: number, expected: string) {
    super(`Invalid ${argument}: ${value} (expected ${expected})`, 'INVALID_ARGUMENT', {
      argument,
      value,
    });
  }
}

export class InvalidProfileError extends ConnectionStringError {
  constructor(message: string, field?: string) {
    super(message, 'INVALID_PROFILE', field === undefined ? undefined : { field });
  }
}
