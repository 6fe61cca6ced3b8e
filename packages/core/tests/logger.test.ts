import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../src/logger.js';

describe('createLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('info calls console.debug with [Cartkit:Namespace] prefix', () => {
    createLogger('Reader').info('Opened game.nds');
    expect(console.debug).toHaveBeenCalledWith('[Cartkit:Reader] Opened game.nds');
  });

  it('warn passes the error object as the second argument', () => {
    const err = new Error('short');
    createLogger('Reader').warn('Icon ignored', err);
    expect(console.warn).toHaveBeenCalledWith('[Cartkit:Reader] Icon ignored', err);
  });

  it('warn without an error logs the message only', () => {
    createLogger('Reader').warn('Icon ignored');
    expect(console.warn).toHaveBeenCalledWith('[Cartkit:Reader] Icon ignored');
  });

  it('error calls console.error with prefix', () => {
    createLogger('Reader').error('Read failed');
    expect(console.error).toHaveBeenCalledWith('[Cartkit:Reader] Read failed');
  });
});
