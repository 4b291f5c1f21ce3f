import type {
  ConnectionProfile,
  PostgresConnectionProfile,
  SqlServerConnectionProfile,
} from '../types';
import { ConfigService } from './ConfigService';
import { Logger } from './Logger';
import { PostgresConnectionString } from './PostgresConnectionString';
import { ProfileParser } from './ProfileParser';
import { SqlServerConnectionString } from './SqlServerConnectionString';

/**
 * Builds connection strings from connection profiles.
 *
 * Profile fields are applied to the dialect's builder in a fixed order: user,
 * host, database, timeouts, retry settings, encryption, then free-form
 * parameters, so an explicit parameter overrides a field-derived one.
 */
export class ConnectionStringService {
  private readonly logger: Logger;
  private readonly parser: ProfileParser;

  constructor(config: ConfigService = new ConfigService()) {
    this.logger = config.createLogger('connection-string');
    this.parser = new ProfileParser(config.getEnvironment());
  }

  build(profile: ConnectionProfile): string {
    const connectionString =
      profile.dialect === 'postgres'
        ? this.buildPostgres(profile).toString()
        : this.buildSqlServer(profile).toString();

    const logger = this.logger.child({ dialect: profile.dialect, profile: profile.name });
    logger.info('Connection string built', {
      hasCredentials: profile.username !== undefined,
      parameterKeys: Object.keys(profile.parameters),
    });

    return connectionString;
  }

  buildFromYaml(content: string): string {
    try {
      return this.build(this.parser.parse(content));
    } catch (error) {
      this.logger.error('Failed to build connection string from profile', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  buildPostgres(profile: PostgresConnectionProfile): PostgresConnectionString {
    let builder = PostgresConnectionString.create();

    if (profile.username !== undefined) {
      builder =
        profile.password !== undefined
          ? builder.setUsernameAndPassword(profile.username, profile.password)
          : builder.setUsernameWithoutPassword(profile.username);
    }

    if (profile.host !== undefined) {
      builder =
        profile.port !== undefined
          ? builder.setHostWithPort(profile.host, profile.port)
          : builder.setHostWithDefaultPort(profile.host);
    }

    if (profile.database !== undefined) {
      builder = builder.setDatabaseName(profile.database);
    }

    if (profile.connectTimeout !== undefined) {
      builder = builder.setConnectTimeout(profile.connectTimeout);
    }

    for (const [key, value] of Object.entries(profile.parameters)) {
      builder = builder.dangerouslySetParameter(key, value);
    }

    return builder;
  }

  buildSqlServer(profile: SqlServerConnectionProfile): SqlServerConnectionString {
    let builder = SqlServerConnectionString.create();

    if (profile.username !== undefined) {
      builder =
        profile.password !== undefined
          ? builder.setUsernameAndPassword(profile.username, profile.password)
          : builder.setUsernameWithoutPassword(profile.username);
    }

    if (profile.host !== undefined) {
      builder =
        profile.port !== undefined
          ? builder.setHostWithPort(profile.host, profile.port)
          : builder.setHostWithDefaultPort(profile.host);
    }

    if (profile.database !== undefined) {
      builder = builder.setDatabaseName(profile.database);
    }

    if (profile.connectTimeout !== undefined) {
      builder = builder.setConnectTimeout(profile.connectTimeout);
    }

    if (profile.commandTimeout !== undefined) {
      builder = builder.setCommandTimeout(profile.commandTimeout);
    }

    if (profile.connectRetryCount !== undefined) {
      builder = builder.setConnectRetryCount(profile.connectRetryCount);
    }

    if (profile.connectRetryInterval !== undefined) {
      builder = builder.setConnectRetryInterval(profile.connectRetryInterval);
    }

    if (profile.encryption === 'enabled') {
      builder = builder.enableEncryption();
    } else if (profile.encryption === 'trust_server_certificate') {
      builder = builder.enableEncryptionAndTrustServerCertificate();
    }

    for (const [key, value] of Object.entries(profile.parameters)) {
      builder = builder.dangerouslySetParameter(key, value);
    }

    return builder;
  }
}
