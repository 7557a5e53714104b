import { expect } from 'chai';

import configArgs, { loadConfig, toConfig } from '../../src/config/args';
import { parseConfig } from '../../src/lib/parseConfig';

describe('Configuration', () => {
  it('should provide defaults', () => {
    expect(loadConfig({}, {})).to.deep.equal({
      log_level: 'error',
      logger: 'console',
      log_file: 'mockldap.log',
      password_attribute: 'userPassword',
      default_filter: '(objectClass=*)',
      options: {},
      record_calls: true,
    });
  });

  it('should read environment variables', () => {
    const config = loadConfig(
      {},
      {
        MOCKLDAP_LOG_LEVEL: 'debug',
        MOCKLDAP_PASSWORD_ATTRIBUTE: 'userSecret',
        MOCKLDAP_OPTIONS: '{"network_timeout": 5}',
        MOCKLDAP_RECORD_CALLS: 'false',
      }
    );
    expect(config.log_level).to.equal('debug');
    expect(config.password_attribute).to.equal('userSecret');
    expect(config.options).to.deep.equal({ network_timeout: 5 });
    expect(config.record_calls).to.equal(false);
  });

  it('should let explicit overrides win', () => {
    const config = loadConfig({ log_level: 'info' }, { MOCKLDAP_LOG_LEVEL: 'debug' });
    expect(config.log_level).to.equal('info');
  });

  it('should validate a parsed configuration', () => {
    const config = toConfig(
      parseConfig(configArgs, { MOCKLDAP_LOGGER: 'file', MOCKLDAP_LOG_FILE: '/tmp/test.log' })
    );
    expect(config.logger).to.equal('file');
    expect(config.log_file).to.equal('/tmp/test.log');
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({}, { MOCKLDAP_LOG_LEVEL: 'verbose' })).to.throw(
      'Invalid configuration: log_level must be one of error, warn, notice, info, debug'
    );
  });

  it('should reject an unknown logger', () => {
    expect(() => loadConfig({}, { MOCKLDAP_LOGGER: 'syslog' })).to.throw(
      'Invalid configuration: logger must be "console" or "file"'
    );
  });

  it('should reject an empty password attribute', () => {
    expect(() => loadConfig({}, { MOCKLDAP_PASSWORD_ATTRIBUTE: '' })).to.throw(
      'Invalid configuration: password_attribute must be a non-empty string'
    );
  });
});
