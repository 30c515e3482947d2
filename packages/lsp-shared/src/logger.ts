/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { getLogNotificationHandler, LogMessageType } from './notification';

/**
 * Priority mapping for log levels (higher number = higher priority)
 */
const LOG_LEVEL_PRIORITY: Record<LogMessageType, number> = {
  error: 5,
  warning: 4,
  info: 3,
  log: 2,
  debug: 1,
};

/**
 * Convert string log level to LogMessageType
 * @param level String representation of log level
 * @returns LogMessageType string value, `info` for anything unrecognised
 */
export const stringToLogLevel = (level: string): LogMessageType => {
  switch (level.toLowerCase()) {
    case 'error':
      return 'error';
    case 'warn':
    case 'warning':
      return 'warning';
    case 'info':
      return 'info';
    case 'log':
      return 'log';
    case 'debug':
      return 'debug';
    default:
      return 'info';
  }
};

let currentLogLevel: LogMessageType = 'error';

/**
 * Set the global log level
 * @param level The log level to set
 */
export const setLogLevel = (level: LogMessageType | string): void => {
  currentLogLevel = stringToLogLevel(level);
};

export const getLogLevel = (): LogMessageType => currentLogLevel;

/**
 * Check if a message type should be logged based on current log level
 */
export const shouldLog = (messageType: LogMessageType): boolean => {
  const messagePriority =
    LOG_LEVEL_PRIORITY[messageType] ?? LOG_LEVEL_PRIORITY.log;
  return messagePriority >= LOG_LEVEL_PRIORITY[currentLogLevel];
};

/**
 * A message or a provider that builds it only when the level is enabled
 */
export type LogMessage = string | (() => string);

/**
 * Interface for the logger implementation
 * Aligned with LSP window/logMessage structure while providing convenience methods
 */
export interface LoggerInterface {
  /**
   * Log a message with the specified type
   * @param messageType - The LSP message type (Error, Warning, Info, Log, Debug)
   * @param message - The message to log
   */
  log(messageType: LogMessageType, message: string): void;

  /**
   * Log a message with lazy evaluation
   * @param messageType - The LSP message type (Error, Warning, Info, Log, Debug)
   * @param messageProvider - Function that returns the message to log
   */
  log(messageType: LogMessageType, messageProvider: () => string): void;

  debug(message: string): void;
  debug(messageProvider: () => string): void;

  info(message: string): void;
  info(messageProvider: () => string): void;

  warn(message: string): void;
  warn(messageProvider: () => string): void;

  error(message: string): void;
  error(messageProvider: () => string): void;
}

/**
 * Interface for the logger factory
 */
export interface LoggerFactory {
  getLogger(): LoggerInterface;
}

const resolveMessage = (message: LogMessage): string =>
  typeof message === 'function' ? message() : message;

/**
 * Shared level filtering and convenience methods; subclasses only decide
 * where an accepted message goes.
 */
abstract class LevelFilteredLogger implements LoggerInterface {
  protected abstract write(messageType: LogMessageType, message: string): void;

  public log(messageType: LogMessageType, message: LogMessage): void {
    if (!shouldLog(messageType)) {
      return;
    }
    this.write(messageType, resolveMessage(message));
  }

  public debug(message: LogMessage): void {
    this.log('debug', message);
  }

  public info(message: LogMessage): void {
    this.log('info', message);
  }

  public warn(message: LogMessage): void {
    this.log('warning', message);
  }

  public error(message: LogMessage): void {
    this.log('error', message);
  }
}

class NoOpLogger implements LoggerInterface {
  public log(_messageType: LogMessageType, _message: LogMessage): void {}

  public debug(_message: LogMessage): void {}

  public info(_message: LogMessage): void {}

  public warn(_message: LogMessage): void {}

  public error(_message: LogMessage): void {}
}

class NoOpLoggerFactory implements LoggerFactory {
  private static instance: LoggerInterface = new NoOpLogger();

  public getLogger(): LoggerInterface {
    return NoOpLoggerFactory.instance;
  }
}

const MESSAGE_TYPE_LABEL: Record<LogMessageType, string> = {
  error: 'ERROR',
  warning: 'WARN',
  info: 'INFO',
  log: 'LOG',
  debug: 'DEBUG',
};

// Console logger implementation for standalone usage
class ConsoleLogger extends LevelFilteredLogger {
  protected write(messageType: LogMessageType, message: string): void {
    const timestamp = new Date().toISOString();
    const formatted = `[${timestamp}] [${MESSAGE_TYPE_LABEL[messageType]}] ${message}`;
    switch (messageType) {
      case 'error':
        console.error(formatted);
        break;
      case 'warning':
        console.warn(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      default:
        console.log(formatted);
        break;
    }
  }
}

class ConsoleLoggerFactory implements LoggerFactory {
  private static instance: LoggerInterface = new ConsoleLogger();

  public getLogger(): LoggerInterface {
    return ConsoleLoggerFactory.instance;
  }
}

/**
 * Routes messages through the installed LogNotificationHandler, so a host
 * connection can surface them as `window/logMessage` notifications.
 */
class NotificationLogger extends LevelFilteredLogger {
  protected write(messageType: LogMessageType, message: string): void {
    getLogNotificationHandler().sendLogMessage({ type: messageType, message });
  }
}

class NotificationLoggerFactory implements LoggerFactory {
  private static instance: LoggerInterface = new NotificationLogger();

  public getLogger(): LoggerInterface {
    return NotificationLoggerFactory.instance;
  }
}

let loggerFactory: LoggerFactory = new NoOpLoggerFactory();

/**
 * Set the logger factory
 * @param factory The logger factory to use
 */
export const setLoggerFactory = (factory: LoggerFactory): void => {
  loggerFactory = factory;
};

/**
 * Get the current logger instance
 */
export const getLogger = (): LoggerInterface => loggerFactory.getLogger();

/**
 * Enable console logging with timestamps
 */
export const enableConsoleLogging = (): void => {
  setLoggerFactory(new ConsoleLoggerFactory());
};

/**
 * Forward log messages to the current log notification handler
 */
export const enableNotificationLogging = (): void => {
  setLoggerFactory(new NotificationLoggerFactory());
};

/**
 * Disable all logging (set to no-op logger)
 */
export const disableLogging = (): void => {
  setLoggerFactory(new NoOpLoggerFactory());
};
