/**
 * Title helper unit tests
 */
import { describe, it, expect } from 'vitest';
import { MAX_TITLE_LENGTH, filterTitles, isValidTitle } from '../../../src/wiki/titles.js';

describe('isValidTitle', () => {
  it('should accept ordinary article titles', () => {
    expect(isValidTitle('Рим')).toBe(true);
    expect(isValidTitle('Якопо Понтормо')).toBe(true);
  });

  it('should reject namespaced titles', () => {
    expect(isValidTitle('Війна:Ресурси')).toBe(false);
    expect(isValidTitle('Категорія:Італія')).toBe(false);
  });

  it('should reject subpage titles', () => {
    expect(isValidTitle('Рим/Історія')).toBe(false);
  });

  it('should reject blank titles', () => {
    expect(isValidTitle('')).toBe(false);
    expect(isValidTitle('   ')).toBe(false);
  });

  it('should reject titles longer than the cache column', () => {
    expect(isValidTitle('L'.repeat(MAX_TITLE_LENGTH))).toBe(true);
    expect(isValidTitle('L'.repeat(MAX_TITLE_LENGTH + 1))).toBe(false);
  });

  it('should count characters rather than UTF-16 units', () => {
    expect(isValidTitle('😀'.repeat(MAX_TITLE_LENGTH))).toBe(true);
  });
});

describe('filterTitles', () => {
  it('should keep valid titles in order', () => {
    expect(filterTitles(['Рим', 'Шаблон:Місто', 'Італія', 'Рим/Архів'])).toEqual(['Рим', 'Італія']);
  });
});
