import winston from 'winston';

import { LOG_LEVELS, type Config } from '../config/args';

// Syslog-like priorities, notice sitting between warn and info
const levels: Record<string, number> = Object.fromEntries(
  LOG_LEVELS.map((level, priority) => [level, priority])
);

const colors = {
  error: 'red',
  warn: 'yellow',
  notice: 'cyan',
  info: 'green',
  debug: 'blue',
};
winston.addColors(colors);

// Add notice method to winston.Logger type
declare module 'winston' {
  interface Logger {
    notice: winston.LeveledLogMethod;
  }
}

export type LoggerConfig = Pick<Config, 'log_level' | 'logger' | 'log_file'>;

/**
 * Logger shared by the operations of one emulator. Lines are prefixed with
 * the "mockldap" label so they stand out among the output of the code
 * under test.
 */
export const buildLogger = (config: LoggerConfig): winston.Logger =>
  winston.createLogger({
    levels,
    level: config.log_level,
    format: winston.format.combine(
      winston.format.label({ label: 'mockldap' }),
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, label, level, message }) => {
        return `${String(timestamp)} [${String(label)}] [${level}]: ${String(message)}`;
      })
    ),
    transports: [
      config.logger === 'console'
        ? new winston.transports.Console({
            stderrLevels: ['error', 'warn'],
          })
        : new winston.transports.File({ filename: config.log_file }),
    ],
  });
