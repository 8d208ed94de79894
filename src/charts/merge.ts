/**
 * Values layering: preset, values files, then `--set` overrides
 */

import { Success, Failure, type Result } from '../domain/types/index.js';
import { isPlainObject } from '../lib/json.js';

export type Values = Record<string, unknown>;

/**
 * Objects merge key by key; arrays and scalars from `override` replace
 */
export function mergeValues(base: Values, override: Values): Values {
  const merged: Values = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeValues(current, value) : value;
  }
  return merged;
}

/**
 * Scalars typed on the command line: booleans, null and integers keep their type
 */
export function parseScalar(raw: string): unknown {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === 'null') return null;
  if (/^-?\d+$/.test(raw)) return Number(raw);
  return raw;
}

function setPath(target: Values, path: string[], value: unknown): Values {
  const [head, ...rest] = path;
  if (head === undefined) {
    return target;
  }
  if (rest.length === 0) {
    return { ...target, [head]: value };
  }
  const child = target[head];
  return { ...target, [head]: setPath(isPlainObject(child) ? child : {}, rest, value) };
}

/**
 * Apply one `--set` argument; commas separate several assignments
 */
export function applySetExpression(values: Values, expression: string): Result<Values> {
  let result = values;
  for (const assignment of expression.split(',')) {
    const separator = assignment.indexOf('=');
    const key = separator > 0 ? assignment.slice(0, separator).trim() : '';
    const path = key.split('.');
    if (key === '' || path.some((segment) => segment === '')) {
      return Failure(`Invalid --set expression '${assignment}': expected key=value`);
    }
    result = setPath(result, path, parseScalar(assignment.slice(separator + 1)));
  }
  return Success(result);
}
