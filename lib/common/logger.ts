/**
 *  Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
 *
 *  Licensed under the Apache License, Version 2.0 (the "License"). You may not use this file except in compliance
 *  with the License. A copy of the License is located at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 *  or in the 'license' file accompanying this file. This file is distributed on an 'AS IS' BASIS, WITHOUT WARRANTIES
 *  OR CONDITIONS OF ANY KIND, express or implied. See the License for the specific language governing permissions
 *  and limitations under the License.
 */

/**
 * @fileoverview Logging Infrastructure - Winston-based logging with icons and structured output
 *
 * Two loggers are configured: the main logger honours the `LOG_LEVEL` environment variable,
 * the status logger always writes at info level and is meant for user-facing progress lines.
 *
 * @example
 * ```typescript
 * import { createLogger } from './logger';
 *
 * const logger = createLogger(['endpoint']);
 * logger.processStart('Creating endpoint /v1/items', 'a1b2c3d4e5');
 * // 2024-05-01 10:30:45.123 | info | endpoint | 🚀  [a1b2c3d4e5] Creating endpoint /v1/items
 *
 * logger.dryRun('PutMethodCommand', { httpMethod: 'GET' });
 * // 2024-05-01 10:30:45.123 | info | endpoint | 🔍  Dry run is true, so not executing PutMethodCommand
 * // 2024-05-01 10:30:45.123 | info | endpoint | 🔍  Would have executed PutMethodCommand with arguments: {"httpMethod":"GET"}
 * ```
 */

import * as winston from 'winston';

/**
 * Main Winston logger instance for general application logging.
 */
const Logger = winston.createLogger({
  defaultMeta: { mainLabel: 'apigw-builder' },
  level: process.env['LOG_LEVEL'] ?? 'info',
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf(({ message, timestamp, level, mainLabel, childLabel }) => {
      return `${timestamp} | ${level} | ${childLabel || mainLabel} | ${message}`;
    }),
    winston.format.align(),
  ),
  transports: [new winston.transports.Console()],
});

/**
 * Status logger for high-priority messages that bypass log level filtering.
 */
const StatusLogger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf(({ message, timestamp, childLabel }) => {
      return `${timestamp} | status | ${childLabel} | ${message}`;
    }),
    winston.format.align(),
  ),
  transports: [new winston.transports.Console()],
});

/**
 * Icon-enabled logger interface. Every method takes an optional prefix, typically the REST API id
 * or `apiId:path` of the resource being worked on, rendered as `[prefix]`.
 */
export interface IconLogger {
  /** Log informational message with info icon (ℹ️) */
  info(message: string, prefix?: string): void;
  /** Log warning message with warning icon (⚠️) */
  warn(message: string, prefix?: string): void;
  /** Log error message with error icon (❌) */
  error(message: string, prefix?: string): void;
  /** Log process start message with rocket icon (🚀) */
  processStart(message: string, prefix?: string): void;
  /** Log process completion message with checkmark icon (✅) */
  processEnd(message: string, prefix?: string): void;
  /** Log a command skipped because of dry run, with magnifying glass icon (🔍) */
  dryRun(commandName: string, parameters: object, prefix?: string): void;
  /** Log AWS command execution with info icon (ℹ️) */
  commandExecution(commandName: string, parameters: object, prefix?: string): void;
  /** Log successful AWS command completion with info icon (ℹ️) */
  commandSuccess(commandName: string, parameters: object, prefix?: string): void;
}

function logMessage(message: string, level: 'info' | 'warn' | 'error', logger: winston.Logger, prefix?: string): void {
  const formattedMessage = prefix ? `[${prefix}] ${message}` : message;
  logger[level](formattedMessage);
}

function buildIconLogger(baseLogger: winston.Logger): IconLogger {
  return {
    info: (message: string, prefix?: string) => logMessage(`ℹ️  ${message}`, 'info', baseLogger, prefix),

    warn: (message: string, prefix?: string) => logMessage(`⚠️  ${message}`, 'warn', baseLogger, prefix),

    error: (message: string, prefix?: string) => logMessage(`❌  ${message}`, 'error', baseLogger, prefix),

    processStart: (message: string, prefix?: string) => logMessage(`🚀  ${message}`, 'info', baseLogger, prefix),

    processEnd: (message: string, prefix?: string) => logMessage(`✅  ${message}`, 'info', baseLogger, prefix),

    dryRun: (commandName: string, parameters: object, prefix?: string) => {
      const dryRunIcon = `🔍`;
      logMessage(`${dryRunIcon}  Dry run is true, so not executing ${commandName}`, 'info', baseLogger, prefix);
      logMessage(
        `${dryRunIcon}  Would have executed ${commandName} with arguments: ${JSON.stringify(parameters)}`,
        'info',
        baseLogger,
        prefix,
      );
    },

    commandExecution: (commandName: string, parameters: object, prefix?: string) =>
      logMessage(
        `ℹ️  Executing ${commandName} with arguments: ${JSON.stringify(parameters)}`,
        'info',
        baseLogger,
        prefix,
      ),

    commandSuccess: (commandName: string, parameters: object, prefix?: string) =>
      logMessage(
        `ℹ️  Successfully executed ${commandName} with arguments: ${JSON.stringify(parameters)}`,
        'info',
        baseLogger,
        prefix,
      ),
  };
}

/**
 * Creates an icon-enabled logger labelled with the given strings joined by ` | `.
 *
 * @param logInfo - Labels, usually the calling file name (e.g. ['resource-hierarchy'])
 */
export const createLogger = (logInfo: string[]): IconLogger => {
  return buildIconLogger(Logger.child({ childLabel: logInfo.join(' | ') }));
};

/**
 * Creates an icon-enabled status logger that ignores `LOG_LEVEL`.
 *
 * @param logInfo - Labels for the logger (must not be empty)
 * @throws {Error} When logInfo is empty
 */
export const createStatusLogger = (logInfo: string[]): IconLogger => {
  if (!logInfo || logInfo.length === 0) {
    throw new Error('createStatusLogger requires at least one log info item');
  }
  return buildIconLogger(StatusLogger.child({ childLabel: logInfo.join(' | ') }));
};

/**
 * Changes the level of the main logger and of every logger created from it.
 * The status logger keeps logging at info.
 *
 * @param level - winston level name, e.g. `warn` or `debug`
 */
export const setLogLevel = (level: string): void => {
  Logger.level = level;
};
