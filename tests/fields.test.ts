import { describe, it, expect } from 'vitest';
import { firstSet, firstString, flagSet, getPath, isJsonObject, scalarOrNull } from '../src/utils/fields.js';

const doc = {
  current_session: { percent_used: null, resets_in: '' },
  quota_used_pct: 55,
  resets_in: '2h0m',
  valid: true,
  nested: { deep: { value: 0 } },
};

describe('field lookups', () => {
  it('should walk dotted paths', () => {
    expect(getPath(doc, 'nested.deep.value')).toBe(0);
    expect(getPath(doc, 'nested.missing.value')).toBeUndefined();
    expect(getPath('not an object', 'a')).toBeUndefined();
  });

  it('should fall back past null and empty values', () => {
    expect(firstSet(doc, 'current_session.percent_used', 'quota_used_pct')).toBe(55);
    expect(firstString(doc, 'current_session.resets_in', 'resets_in')).toBe('2h0m');
  });

  it('should treat zero as set', () => {
    expect(firstSet(doc, 'nested.deep.value', 'quota_used_pct')).toBe(0);
  });

  it('should stringify numbers and return empty string when nothing is set', () => {
    expect(firstString(doc, 'quota_used_pct')).toBe('55');
    expect(firstString(doc, 'missing', 'also.missing')).toBe('');
  });

  it('should only count literal true as a set flag', () => {
    expect(flagSet(doc, 'valid')).toBe(true);
    expect(flagSet({ valid: 'true' }, 'valid')).toBe(false);
  });

  it('should keep scalars and drop other values', () => {
    expect(scalarOrNull(doc, 'quota_used_pct')).toBe(55);
    expect(scalarOrNull(doc, 'valid')).toBe(true);
    expect(scalarOrNull(doc, 'resets_in')).toBeNull();
  });

  it('should recognise plain objects only', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
  });
});
