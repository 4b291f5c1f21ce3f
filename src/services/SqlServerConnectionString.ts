import { assertInt32, assertNonNegativeInteger, assertUint8, clamp } from '../utils/guards';
import { QuotingEncoder } from './QuotingEncoder';

export const CONNECT_RETRY_INTERVAL_MIN = 1;
export const CONNECT_RETRY_INTERVAL_MAX = 60;

/**
 * SqlServerConnectionString - semicolon-delimited key/value connection string builder
 *
 * All fields live in one parameter map and every setter funnels through
 * {@link SqlServerConnectionString.dangerouslySetParameter}, which quotes the value
 * when the format requires it. Keys are stored verbatim. Instances are immutable.
 *
 * @example
 * SqlServerConnectionString.create()
 *   .setUsernameAndPassword('user', 'password')
 *   .setHostWithPort('localhost', 1433)
 *   .setDatabaseName('db_name')
 *   .setConnectTimeout(30)
 *   .enableEncryptionAndTrustServerCertificate()
 *   .toString();
 */
export class SqlServerConnectionString {
  private readonly parameterList: ReadonlyMap<string, string>;

  private constructor(parameterList: ReadonlyMap<string, string>) {
    this.parameterList = parameterList;
  }

  static create(): SqlServerConnectionString {
    return new SqlServerConnectionString(new Map());
  }

  get parameters(): ReadonlyMap<string, string> {
    return this.parameterList;
  }

  /**
   * Sets/replaces ANY parameter, including ones this builder has no dedicated setter for.
   * The value is quoted when needed; the key is not touched.
   */
  dangerouslySetParameter(key: string, value: string): SqlServerConnectionString {
    const parameterList = new Map(this.parameterList);
    parameterList.set(key, QuotingEncoder.encode(value));
    return new SqlServerConnectionString(parameterList);
  }

  /**
   * `user=<username>`; also removes a previously set `password`
   */
  setUsernameWithoutPassword(username: string): SqlServerConnectionString {
    return this.dangerouslySetParameter('user', username).removeParameter('password');
  }

  // `user=<username>;password=<password>`
  setUsernameAndPassword(username: string, password: string): SqlServerConnectionString {
    return this.dangerouslySetParameter('user', username).dangerouslySetParameter('password', password);
  }

  // `server=<host>`
  setHostWithDefaultPort(host: string): SqlServerConnectionString {
    return this.dangerouslySetParameter('server', host);
  }

  // `server=<host>,<port>`
  setHostWithPort(host: string, port: number): SqlServerConnectionString {
    return this.dangerouslySetParameter('server', `${host},${assertNonNegativeInteger('port', port)}`);
  }

  enableEncryption(): SqlServerConnectionString {
    return this.dangerouslySetParameter('encrypt', 'true');
  }

  /**
   * Enables encryption and trusts the server certificate, even one that would not
   * normally be trusted (self-signed, unknown root CA, ...)
   */
  enableEncryptionAndTrustServerCertificate(): SqlServerConnectionString {
    return this.enableEncryption().dangerouslySetParameter('trustServerCertificate', 'true');
  }

  setDatabaseName(databaseName: string): SqlServerConnectionString {
    return this.dangerouslySetParameter('database', databaseName);
  }

  /**
   * `timeout=<seconds>`; negative values are ignored
   */
  setConnectTimeout(seconds: number): SqlServerConnectionString {
    if (assertInt32('timeout', seconds) < 0) {
      return this;
    }
    return this.dangerouslySetParameter('timeout', seconds.toString());
  }

  /**
   * `command timeout=<seconds>`; negative values are ignored
   */
  setCommandTimeout(seconds: number): SqlServerConnectionString {
    if (assertInt32('command timeout', seconds) < 0) {
      return this;
    }
    return this.dangerouslySetParameter('command timeout', seconds.toString());
  }

  setConnectRetryCount(count: number): SqlServerConnectionString {
    return this.dangerouslySetParameter(
      'connectRetryCount',
      assertUint8('connectRetryCount', count).toString()
    );
  }

  /**
   * `connectRetryInterval=<seconds>`, clamped to 1..60
   */
  setConnectRetryInterval(seconds: number): SqlServerConnectionString {
    const interval = clamp(
      assertUint8('connectRetryInterval', seconds),
      CONNECT_RETRY_INTERVAL_MIN,
      CONNECT_RETRY_INTERVAL_MAX
    );
    return this.dangerouslySetParameter('connectRetryInterval', interval.toString());
  }

  toString(): string {
    return Array.from(this.parameterList, ([key, value]) => `${key}=${value}`).join(';');
  }

  private removeParameter(key: string): SqlServerConnectionString {
    if (!this.parameterList.has(key)) {
      return this;
    }
    const parameterList = new Map(this.parameterList);
    parameterList.delete(key);
    return new SqlServerConnectionString(parameterList);
  }
}
