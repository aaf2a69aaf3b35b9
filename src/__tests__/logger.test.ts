/**
 * Tests for the prefixed console logger
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { createLogger, getLogLevel, setLogLevel } from '../logger.js';

describe('createLogger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('prefixes messages with the component and passes context through', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('info');

    createLogger('loader').info('Parsed checklist', { categories: 2 });

    expect(spy).toHaveBeenCalledWith('[loader] Parsed checklist', { categories: 2 });
  });

  it('omits the context argument when none is given', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('info');

    createLogger('layout').warn('Overflow');

    expect(spy).toHaveBeenCalledWith('[layout] Overflow');
  });

  it('drops messages below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('error');

    const log = createLogger('checklist');
    log.debug('hidden');
    log.info('hidden');
    log.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[checklist] shown');
  });
});
