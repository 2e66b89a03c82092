/**
 * Normalizer
 *
 * Converts values as produced by a source (JSON documents, AWS SDK
 * output shapes) into ConfigValue. Every object is source data: one that
 * happens to carry a `kind` key is still a map.
 *
 * Integer-like numbers of any width widen to a double, so `8` from one
 * source and `8.0` from the other compare equal. There is no coercion
 * between strings and numbers or booleans: `"8"` and `8` remain
 * different values and are reported as drift.
 */

import { ValidationError } from '../../core/errors.js';
import {
  type ConfigValue,
  type MapValue,
  boolValue,
  listValue,
  mapValue,
  nullValue,
  numberValue,
  stringValue
} from '../../models/config-value.js';

/**
 * Normalizes an arbitrary source value.
 *
 * @throws ValidationError when the input holds something with no
 * ConfigValue counterpart (functions, symbols, NaN, class instances)
 */
export function normalize(input: unknown): ConfigValue {
  return normalizeAt(input, '$');
}

/**
 * Normalizes a source value that must be a map at the top level,
 * as every resource description is.
 */
export function normalizeTree(input: unknown): MapValue {
  const value = normalize(input);
  if (value.kind !== 'map') {
    throw new ValidationError(`Expected a map at the root, got ${value.kind}`, '$');
  }
  return value;
}

function normalizeAt(input: unknown, path: string): ConfigValue {
  if (input === null || input === undefined) {
    return nullValue();
  }

  switch (typeof input) {
    case 'boolean':
      return boolValue(input);
    case 'number':
      if (Number.isNaN(input)) {
        throw new ValidationError(`NaN cannot be compared at ${path}`, path);
      }
      return numberValue(input);
    case 'bigint':
      return numberValue(Number(input));
    case 'string':
      return stringValue(input);
    case 'object':
      return normalizeObject(input, path);
    default:
      throw new ValidationError(`Unsupported ${typeof input} value at ${path}`, path);
  }
}

function normalizeObject(input: object, path: string): ConfigValue {
  if (input instanceof Date) {
    return stringValue(input.toISOString());
  }

  if (Array.isArray(input) || input instanceof Set) {
    const items: ConfigValue[] = [];
    let index = 0;
    for (const item of input) {
      items.push(normalizeAt(item, `${path}[${index++}]`));
    }
    return listValue(items);
  }

  if (input instanceof Map) {
    const entries = new Map<string, ConfigValue>();
    for (const [key, value] of input) {
      if (typeof key !== 'string') {
        throw new ValidationError(`Map keys must be strings at ${path}`, path);
      }
      if (value !== undefined) {
        entries.set(key, normalizeAt(value, `${path}.${key}`));
      }
    }
    return mapValue(entries);
  }

  if (!isPlainObject(input)) {
    throw new ValidationError(
      `Unsupported ${input.constructor.name} instance at ${path}`,
      path
    );
  }

  const entries = new Map<string, ConfigValue>();
  for (const [key, value] of Object.entries(input)) {
    // the AWS SDK leaves unset optional members undefined
    if (value !== undefined) {
      entries.set(key, normalizeAt(value, `${path}.${key}`));
    }
  }
  return mapValue(entries);
}

function isPlainObject(input: object): boolean {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === null || proto === Object.prototype;
}
