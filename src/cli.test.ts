/**
 * Tests for the CLI wiring
 */

import { describe, it, expect } from 'vitest';
import { REPAIR_HELP, createProgram, shouldRunInteractive } from './cli.js';

describe('shouldRunInteractive', () => {
  it('should run interactively without arguments or with -i', () => {
    expect(shouldRunInteractive(['node', 'index.js'])).toBe(true);
    expect(shouldRunInteractive(['node', 'index.js', '-i'])).toBe(true);
    expect(shouldRunInteractive(['node', 'index.js', '--interactive'])).toBe(true);
  });

  it('should not run interactively with a command', () => {
    expect(shouldRunInteractive(['node', 'index.js', 'repair', 'x_metadata.json'])).toBe(false);
  });
});

describe('createProgram', () => {
  it('should register every phase', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual([
      'extract',
      'download',
      'process',
      'upload',
      'repair',
      'run',
      'test-connection',
    ]);
  });

  it('should default timestamps to UTC', () => {
    const repair = createProgram().commands.find((command) => command.name() === 'repair');
    expect(repair?.opts()).toEqual({ timezone: 'utc', utcOffset: '-08:00' });
  });

  it('should warn about ordinal matches in the repair help', () => {
    const repair = createProgram().commands.find((command) => command.name() === 'repair');
    let help = '';
    repair?.configureOutput({ writeOut: (text) => (help += text) });

    repair?.outputHelp();

    expect(help.endsWith(`${REPAIR_HELP}\n`)).toBe(true);
    expect(help).toContain('IMG_0042.jpg matches memory 42');
  });
});
