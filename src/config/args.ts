/**
 * Configuration keys, corresponding environment variables, default values and types
 * Contains also the typescript declaration of config
 */
import {
  parseConfig,
  type ConfigTemplate,
  type ConfigValue,
  type RawConfig,
} from '../lib/parseConfig';

export const LOG_LEVELS = ['error', 'warn', 'notice', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Typescript declaration of config
 *
 * See below for config keys, corresponding environment variables,
 * default value and type
 */
export interface Config {
  log_level: LogLevel;
  logger: 'console' | 'file';
  log_file: string;
  // Attribute compared through the password verifier
  password_attribute: string;
  default_filter: string;
  // Initial session options
  options: Record<string, unknown>;
  record_calls: boolean;
}

const configArgs: ConfigTemplate = [
  ['log_level', 'MOCKLDAP_LOG_LEVEL', 'error'],
  ['logger', 'MOCKLDAP_LOGGER', 'console'],
  ['log_file', 'MOCKLDAP_LOG_FILE', 'mockldap.log'],
  ['password_attribute', 'MOCKLDAP_PASSWORD_ATTRIBUTE', 'userPassword'],
  ['default_filter', 'MOCKLDAP_DEFAULT_FILTER', '(objectClass=*)'],
  ['options', 'MOCKLDAP_OPTIONS', {}, 'json'],
  ['record_calls', 'MOCKLDAP_RECORD_CALLS', true, 'boolean'],
];

export default configArgs;

const isLogLevel = (value: ConfigValue): value is LogLevel =>
  typeof value === 'string' && LOG_LEVELS.some(level => level === value);

const stringValue = (raw: RawConfig, key: string): string => {
  const value = raw[key];
  if (typeof value !== 'string' || value === '') {
    throw new Error(`Invalid configuration: ${key} must be a non-empty string`);
  }
  return value;
};

/**
 * Check a parsed configuration and give it its typed shape
 */
export const toConfig = (raw: RawConfig): Config => {
  const level = raw.log_level;
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid configuration: log_level must be one of ${LOG_LEVELS.join(', ')}`
    );
  }
  const logger = raw.logger;
  if (logger !== 'console' && logger !== 'file') {
    throw new Error('Invalid configuration: logger must be "console" or "file"');
  }
  const options = raw.options;
  if (typeof options !== 'object' || Array.isArray(options)) {
    throw new Error('Invalid configuration: options must be a JSON object');
  }
  return {
    log_level: level,
    logger,
    log_file: stringValue(raw, 'log_file'),
    password_attribute: stringValue(raw, 'password_attribute'),
    default_filter: stringValue(raw, 'default_filter'),
    options: { ...options },
    record_calls: raw.record_calls === true,
  };
};

/**
 * Configuration from defaults and environment, then explicit overrides
 */
export const loadConfig = (
  overrides: Partial<Config> = {},
  env: NodeJS.ProcessEnv = process.env
): Config => ({
  ...toConfig(parseConfig(configArgs, env)),
  ...overrides,
});
