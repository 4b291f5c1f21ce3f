import { describe, it, expect, beforeEach } from 'vitest';
import { ProfileParser } from '@/services/ProfileParser';
import { ConnectionStringError, InvalidProfileError } from '@/types';
import { captureError } from '../helpers/assertions';

describe('ProfileParser', () => {
  let parser: ProfileParser;

  beforeEach(() => {
    parser = new ProfileParser({
      DB_PASSWORD: 'test-secret',
      DB_HOST: 'db.example',
      DB_PORT: '1433',
    });
  });

  describe('parse', () => {
    it('should parse a postgres profile with variable substitution', () => {
      const profile = parser.parse(`
name: reporting
dialect: postgres
username: app
password: \${DB_PASSWORD}
host: db.internal
port: 5432
database: reports
connect_timeout: 10
parameters:
  application_name: reports
  sslmode: require
`);

      expect(profile).toEqual({
        dialect: 'postgres',
        name: 'reporting',
        username: 'app',
        password: 'test-secret',
        host: 'db.internal',
        port: 5432,
        database: 'reports',
        connectTimeout: 10,
        parameters: { application_name: 'reports', sslmode: 'require' },
      });
    });

    it('should parse a sqlserver profile with numeric strings from variables', () => {
      const profile = parser.parse(`
dialect: sqlserver
host: \${DB_HOST}
port: \${DB_PORT}
command_timeout: 60
connect_retry_count: 3
connect_retry_interval: 10
encryption: trust_server_certificate
`);

      expect(profile).toEqual({
        dialect: 'sqlserver',
        host: 'db.example',
        port: 1433,
        commandTimeout: 60,
        connectRetryCount: 3,
        connectRetryInterval: 10,
        encryption: 'trust_server_certificate',
        parameters: {},
      });
    });

    it('should accept JSON and default encryption to none', () => {
      const profile = parser.parse('{"dialect": "sqlserver", "host": "sql01"}');

      expect(profile).toEqual({
        dialect: 'sqlserver',
        host: 'sql01',
        encryption: 'none',
        parameters: {},
      });
    });

    it('should keep unknown variables verbatim', () => {
      const profile = parser.parse('dialect: postgres\nusername: app\npassword: ${MISSING_VAR}\n');

      expect(profile.password).toBe('${MISSING_VAR}');
    });

    it('should keep numeric-looking credentials and parameters as written', () => {
      const profile = parser.parse(`
dialect: postgres
username: app
password: 12345
parameters:
  keepalives: 1
  ssl: false
`);

      expect(profile.password).toBe('12345');
      expect(profile.parameters).toEqual({ keepalives: '1', ssl: 'false' });
    });

    it('should not reformat leading zeros or trailing decimal zeros', () => {
      const profile = parser.parse('dialect: sqlserver\nusername: sa\npassword: 0123\nparameters:\n  v: 1.10\n');

      expect(profile.password).toBe('0123');
      expect(profile.parameters).toEqual({ v: '1.10' });
    });

    it('should leave bare $NAME references untouched', () => {
      const profile = new ProfileParser({ HOME: '/root' }).parse(
        'dialect: sqlserver\nusername: sa\npassword: pa$HOME\n'
      );

      expect(profile.password).toBe('pa$HOME');
    });

    it('should turn $$ into a literal dollar sign', () => {
      const profile = parser.parse('dialect: postgres\nusername: app\npassword: pa$${DB_PASSWORD}\n');

      expect(profile.password).toBe('pa${DB_PASSWORD}');
    });

    it('should keep a __proto__ parameter as an ordinary key', () => {
      const profile = parser.parse('dialect: postgres\nparameters:\n  __proto__: x\n');

      expect(Object.keys(profile.parameters)).toEqual(['__proto__']);
      expect(Object.getOwnPropertyDescriptor(profile.parameters, '__proto__')?.value).toBe('x');
    });
  });

  describe('validation', () => {
    function expectInvalid(content: string, message: string) {
      const error = captureError(() => parser.parse(content));
      expect(error).toBeInstanceOf(InvalidProfileError);
      expect(error).toHaveProperty('code', 'INVALID_PROFILE');
      expect(error).toHaveProperty('message', message);
    }

    it('should reject an unsupported dialect', () => {
      expectInvalid('dialect: mysql', "Unsupported dialect: mysql. Expected 'postgres' or 'sqlserver'");
    });

    it('should reject a missing dialect', () => {
      expectInvalid('host: db', "Unsupported dialect: missing. Expected 'postgres' or 'sqlserver'");
    });

    it('should reject sqlserver options on a postgres profile', () => {
      expectInvalid(
        'dialect: postgres\ncommand_timeout: 30',
        'Unknown option for postgres profile: command_timeout'
      );
    });

    it('should reject a password without a username', () => {
      expectInvalid('dialect: postgres\npassword: test-secret', 'password requires username');
    });

    it('should reject a port without a host', () => {
      expectInvalid('dialect: sqlserver\nport: 1433', 'port requires host');
    });

    it('should reject non-integer numeric fields', () => {
      expectInvalid('dialect: postgres\nhost: db\nport: abc', 'port must be an integer');
      expectInvalid('dialect: postgres\nconnect_timeout: 1.5', 'connect_timeout must be an integer');
    });

    it('should reject an unknown encryption mode', () => {
      expectInvalid(
        'dialect: sqlserver\nencryption: always',
        'encryption must be one of: none, enabled, trust_server_certificate'
      );
    });

    it('should reject nested parameter values', () => {
      expectInvalid(
        'dialect: postgres\nparameters:\n  options:\n    - a',
        'parameters.options must be a scalar value'
      );
    });

    it('should reject documents that are not mappings', () => {
      expectInvalid('- a\n- b', 'Connection profile must be a mapping');
      expectInvalid('', 'Connection profile must be a mapping');
    });

    it('should report unparseable content', () => {
      const error = captureError(() => parser.parse('dialect: [postgres'));

      expect(error).toBeInstanceOf(ConnectionStringError);
      expect(error).toHaveProperty('code', 'PROFILE_PARSE_ERROR');
    });
  });
});
