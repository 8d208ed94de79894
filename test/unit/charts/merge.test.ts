import { describe, it, expect } from '@jest/globals';
import { applySetExpression, mergeValues, parseScalar } from '../../../src/charts/merge';

describe('mergeValues', () => {
  it('merges nested objects and replaces arrays', () => {
    const base = { image: { repository: 'a', tag: 'latest' }, args: ['serve'], replicaCount: 1 };
    const override = { image: { tag: 'v2' }, args: ['--debug'] };

    expect(mergeValues(base, override)).toEqual({
      image: { repository: 'a', tag: 'v2' },
      args: ['--debug'],
      replicaCount: 1,
    });
    expect(base.image.tag).toBe('latest');
  });
});

describe('parseScalar', () => {
  it('keeps booleans, null and integers typed', () => {
    expect(parseScalar('true')).toBe(true);
    expect(parseScalar('false')).toBe(false);
    expect(parseScalar('null')).toBeNull();
    expect(parseScalar('-3')).toBe(-3);
    expect(parseScalar('0.2.15')).toBe('0.2.15');
    expect(parseScalar('route')).toBe('route');
  });
});

describe('applySetExpression', () => {
  it('sets nested keys and creates missing objects', () => {
    expect(applySetExpression({ exposure: { tls: true } }, 'exposure.type=route,replicaCount=2')).toEqual({
      ok: true,
      value: { exposure: { tls: true, type: 'route' }, replicaCount: 2 },
    });
    expect(applySetExpression({}, 'serviceAccount.create=true')).toEqual({
      ok: true,
      value: { serviceAccount: { create: true } },
    });
  });

  it('keeps everything after the first equals sign', () => {
    expect(applySetExpression({}, 'config.content=a=b')).toEqual({
      ok: true,
      value: { config: { content: 'a=b' } },
    });
  });

  it.each(['novalue', '=x', 'a..b=1'])('rejects %s', (expression) => {
    expect(applySetExpression({}, expression)).toEqual({
      ok: false,
      error: `Invalid --set expression '${expression}': expected key=value`,
    });
  });
});
