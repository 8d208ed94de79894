import { describe, it, expect } from '@jest/globals';
import { isPlainObject, parseToolArguments } from '../../../src/lib/json';

describe('parseToolArguments', () => {
  it('treats blank input as no arguments', () => {
    expect(parseToolArguments('')).toEqual({ ok: true, value: {} });
    expect(parseToolArguments('   ')).toEqual({ ok: true, value: {} });
  });

  it('parses a JSON object', () => {
    expect(parseToolArguments('{"namespace": "default", "limit": 5}')).toEqual({
      ok: true,
      value: { namespace: 'default', limit: 5 },
    });
  });

  it('rejects malformed JSON', () => {
    const result = parseToolArguments('{"namespace":');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.startsWith('Invalid JSON: ')).toBe(true);
    }
  });

  it.each(['[1, 2]', '"text"', '42', 'null'])('rejects non-object value %s', (input) => {
    expect(parseToolArguments(input)).toEqual({ ok: false, error: 'Parameters must be a JSON object' });
  });
});

describe('isPlainObject', () => {
  it('accepts objects only', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('x')).toBe(false);
  });
});
