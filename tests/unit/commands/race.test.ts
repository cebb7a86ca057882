/**
 * race command helpers
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { formatPath, parseDepth, runRace } from '../../../src/commands/race.js';
import { resetConfig } from '../../../src/config/ConfigManager.js';

describe('parseDepth', () => {
  it('should parse whole numbers', () => {
    expect(parseDepth('2')).toBe(2);
    expect(parseDepth(' 3 ')).toBe(3);
  });

  it('should leave range checks to the race configuration', () => {
    expect(parseDepth('7')).toBe(7);
  });

  it('should reject anything else', () => {
    expect(() => parseDepth('two')).toThrow(InvalidArgumentError);
    expect(() => parseDepth('1.5')).toThrow('depth must be a whole number');
    expect(() => parseDepth('-1')).toThrow(InvalidArgumentError);
  });
});

describe('formatPath', () => {
  it('should join titles with arrows', () => {
    expect(formatPath(['Дружба', 'Якопо Понтормо', 'Рим'])).toBe('Дружба -> Якопо Понтормо -> Рим');
  });

  it('should report an empty path', () => {
    expect(formatPath([])).toBe('No path found');
  });
});

describe('runRace', () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
    resetConfig();
  });

  it('should report an out-of-range depth without connecting', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await runRace('Дружба', 'Рим', { depth: 4 });

    expect(stderr).toHaveBeenCalledWith(
      'Invalid race configuration (searchDepth: Number must be less than or equal to 3)'
    );
    expect(process.exitCode).toBe(1);
  });
});
