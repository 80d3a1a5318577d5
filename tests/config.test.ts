import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  resolvePartialResponseOptions,
  ConfigurationException,
  getLogger,
  setLogger,
  resetLogger,
} from '../src/index';

describe('resolvePartialResponseOptions', () => {
  it('should apply defaults', () => {
    expect(resolvePartialResponseOptions()).toEqual({
      queryParam: 'fields',
      ignoreCase: false,
      ignoreParseErrors: false,
      maxDepth: 32,
      maxLength: 4096,
      filterResponses: true,
    });
  });

  it('should keep explicit values', () => {
    expect(
      resolvePartialResponseOptions({
        queryParam: 'select',
        headerName: 'X-Fields',
        ignoreCase: true,
        ignoreParseErrors: true,
        maxDepth: 4,
        maxLength: 256,
        filterResponses: false,
      })
    ).toEqual({
      queryParam: 'select',
      headerName: 'X-Fields',
      ignoreCase: true,
      ignoreParseErrors: true,
      maxDepth: 4,
      maxLength: 256,
      filterResponses: false,
    });
  });

  it('should report every invalid option', () => {
    try {
      resolvePartialResponseOptions({ queryParam: '', maxDepth: -1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationException);
      expect(err).toMatchObject({
        status: 500,
        code: 'CONFIGURATION_ERROR',
        message: 'Invalid partial response options',
        details: [
          expect.objectContaining({ path: 'queryParam' }),
          expect.objectContaining({ path: 'maxDepth' }),
        ],
      });
    }
  });
});

describe('logger', () => {
  afterEach(() => {
    resetLogger();
  });

  it('should prefix console output', () => {
    const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    getLogger().warn('Ignoring malformed fields selector', { selector: 'a(' });
    getLogger().warn('No context');

    expect(consoleSpy.mock.calls).toEqual([
      ['[hono-partial-response] Ignoring malformed fields selector', { selector: 'a(' }],
      ['[hono-partial-response] No context'],
    ]);

    consoleSpy.mockRestore();
  });

  it('should route messages to a custom logger', () => {
    const custom = { warn: vi.fn(), error: vi.fn() };
    setLogger(custom);

    getLogger().error('Unexpected error', { error: 'boom' });

    expect(custom.error).toHaveBeenCalledWith('Unexpected error', { error: 'boom' });
  });
});
