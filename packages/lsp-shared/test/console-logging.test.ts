/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import {
  enableConsoleLogging,
  disableLogging,
  getLogger,
  setLogLevel,
} from '../src/index';

const TIMESTAMP = '\\[\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}\\.\\d{3}Z\\]';

const line = (label: string, message: string): RegExp =>
  new RegExp(`^${TIMESTAMP} \\[${label}\\] ${message}$`);

describe('Console Logging', () => {
  let logSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    setLogLevel('debug');
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    debugSpy = jest.spyOn(console, 'debug').mockImplementation();
    infoSpy = jest.spyOn(console, 'info').mockImplementation();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    setLogLevel('error');
    logSpy.mockRestore();
    debugSpy.mockRestore();
    infoSpy.mockRestore();
    warnSpy.mockRestore();
    errorSpy.mockRestore();
    disableLogging();
  });

  it('should write timestamped lines to the matching console method', () => {
    enableConsoleLogging();
    const logger = getLogger();

    logger.debug('Debug message');
    logger.info('Info message');
    logger.warn('Warning message');
    logger.error('Error message');
    logger.log('log', 'Plain message');

    expect(debugSpy).toHaveBeenCalledWith(
      expect.stringMatching(line('DEBUG', 'Debug message')),
    );
    expect(infoSpy).toHaveBeenCalledWith(
      expect.stringMatching(line('INFO', 'Info message')),
    );
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringMatching(line('WARN', 'Warning message')),
    );
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringMatching(line('ERROR', 'Error message')),
    );
    expect(logSpy).toHaveBeenCalledWith(
      expect.stringMatching(line('LOG', 'Plain message')),
    );
  });

  it('should resolve message providers', () => {
    enableConsoleLogging();

    getLogger().info(() => 'Lazy message');

    expect(infoSpy).toHaveBeenCalledWith(
      expect.stringMatching(line('INFO', 'Lazy message')),
    );
  });

  it('should drop messages below the log level without building them', () => {
    enableConsoleLogging();
    setLogLevel('warning');
    const provider = jest.fn(() => 'Expensive message');

    getLogger().debug(provider);
    getLogger().info('Info message');

    expect(provider).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
  });

  it('should write nothing once logging is disabled', () => {
    enableConsoleLogging();
    disableLogging();

    getLogger().error('Error message');

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
