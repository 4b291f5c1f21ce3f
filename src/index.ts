/**
 * Connection string builders for PostgreSQL (URI-style) and Microsoft SQL Server
 * (semicolon-delimited key/value) connection strings
 */

export { PercentEncoder, PERCENT_REPLACEMENTS } from './services/PercentEncoder';
export { QuotingEncoder } from './services/QuotingEncoder';
export { PostgresConnectionString, POSTGRES_SCHEME } from './services/PostgresConnectionString';
export {
  SqlServerConnectionString,
  CONNECT_RETRY_INTERVAL_MIN,
  CONNECT_RETRY_INTERVAL_MAX,
} from './services/SqlServerConnectionString';
export { ProfileParser } from './services/ProfileParser';
export { ConnectionStringService } from './services/ConnectionStringService';
export { ConfigService } from './services/ConfigService';
export { Logger } from './services/Logger';
export type { LoggerContext } from './services/Logger';
export { ConnectionStringError, InvalidArgumentError, InvalidProfileError } from './types';
export type {
  ConnectionProfile,
  ConnectionStringErrorCode,
  Dialect,
  EncryptionMode,
  EnvironmentRecord,
  HostPort,
  HostSpec,
  LogLevel,
  PostgresConnectionProfile,
  RuntimeConfig,
  SqlServerConnectionProfile,
  UserSpec,
  UsernamePassword,
} from './types';
