import { describe, it, expect, afterEach, jest } from '@jest/globals';

import { createLogger, describeError, setLogLevel } from '../logging/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('info');
    jest.restoreAllMocks();
  });

  it('prefixes lines with the tag and appends extra fields as JSON', () => {
    const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('udp-source').info('listening', { port: 12345 });

    expect(info).toHaveBeenCalledWith('[udp-source] listening {"port":12345}');
  });

  it('drops lines below the threshold', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');
    const log = createLogger('batch-writer');

    log.debug('flushed batch 1');
    log.warn('retrying');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[batch-writer] retrying');
  });
});

describe('describeError', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(503)).toBe('503');
  });
});
