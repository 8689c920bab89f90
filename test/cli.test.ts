/**
 * CLI argument parsing tests
 */

import { describe, it, expect } from 'vitest';
import { parseArgs, HELP_TEXT } from '../src/cli.js';

describe('parseArgs', () => {
  it('defaults to serve on localhost:5000', () => {
    expect(parseArgs([])).toEqual({
      command: 'serve',
      port: 5000,
      host: 'localhost',
      verbose: false,
    });
  });

  it('reads port, host and verbose flags', () => {
    expect(parseArgs(['serve', '-p', '8080', '--host', '0.0.0.0', '-v'])).toEqual({
      command: 'serve',
      port: 8080,
      host: '0.0.0.0',
      verbose: true,
    });
  });

  it('falls back to the default port on a bad value', () => {
    expect(parseArgs(['--port', 'abc']).port).toBe(5000);
  });

  it('switches to help', () => {
    expect(parseArgs(['--help']).command).toBe('help');
    expect(parseArgs(['help']).command).toBe('help');
  });

  it('throws on an unknown argument', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown argument: --bogus');
  });
});

describe('HELP_TEXT', () => {
  it('lists the default port', () => {
    expect(HELP_TEXT).toContain('Server port (default: 5000)');
  });
});
