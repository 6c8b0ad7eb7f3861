import { describe, it, expect, vi, afterEach } from 'vitest';
import * as log from '../../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    log.setLevel('silent');
    vi.restoreAllMocks();
  });

  it('should be silent by default', () => {
    const writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    log.debug('trace');

    expect(writeSpy).not.toHaveBeenCalled();
  });

  it('should drop debug lines above debug level', () => {
    const writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    log.setLevel('info');

    log.debug('trace');

    expect(writeSpy).not.toHaveBeenCalled();
  });

  it('should write debug lines to stderr at debug level', () => {
    const writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    log.setLevel('debug');

    log.debug('trace');

    expect(writeSpy).toHaveBeenCalledTimes(1);
    expect(writeSpy).toHaveBeenCalledWith('🔍 trace\n');
  });
});
