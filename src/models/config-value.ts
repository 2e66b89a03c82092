// Normalized configuration value model

/**
 * A configuration value in the form every comparison works on.
 *
 * Both sides of a drift check (the live resource description and the
 * declared configuration) are converted into this shape at their
 * boundary, so the comparison code never needs to know where a value
 * came from.
 */
export type ConfigValue =
  | NullValue
  | BoolValue
  | NumberValue
  | StringValue
  | ListValue
  | MapValue;

export interface NullValue {
  readonly kind: 'null';
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly ConfigValue[];
}

/**
 * Keys are unique. Insertion order is kept for output only.
 */
export interface MapValue {
  readonly kind: 'map';
  readonly entries: ReadonlyMap<string, ConfigValue>;
}

export type ConfigValueKind = ConfigValue['kind'];

/**
 * JSON-compatible rendering of a ConfigValue
 */
export type PlainValue =
  | null
  | boolean
  | number
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

const NULL_VALUE: NullValue = Object.freeze({ kind: 'null' });

export function nullValue(): NullValue {
  return NULL_VALUE;
}

export function boolValue(value: boolean): BoolValue {
  return { kind: 'bool', value };
}

export function numberValue(value: number): NumberValue {
  return { kind: 'number', value };
}

export function stringValue(value: string): StringValue {
  return { kind: 'string', value };
}

export function listValue(items: readonly ConfigValue[]): ListValue {
  return { kind: 'list', items };
}

export function mapValue(
  entries: ReadonlyMap<string, ConfigValue> | Iterable<readonly [string, ConfigValue]> | Record<string, ConfigValue>
): MapValue {
  if (entries instanceof Map) {
    return { kind: 'map', entries };
  }
  if (isIterable(entries)) {
    return { kind: 'map', entries: new Map(entries) };
  }
  return { kind: 'map', entries: new Map(Object.entries(entries)) };
}

export function isMap(value: ConfigValue): value is MapValue {
  return value.kind === 'map';
}

export function isList(value: ConfigValue): value is ListValue {
  return value.kind === 'list';
}

/**
 * Converts a ConfigValue into plain JSON data.
 * Map keys are emitted in sorted order so equal maps render identically.
 */
export function toPlain(value: ConfigValue): PlainValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'string':
      return value.value;
    case 'list':
      return value.items.map(toPlain);
    case 'map': {
      const result: { [key: string]: PlainValue } = {};
      for (const key of [...value.entries.keys()].sort()) {
        const entry = value.entries.get(key);
        if (entry !== undefined) {
          result[key] = toPlain(entry);
        }
      }
      return result;
    }
  }
}

/**
 * Compact single-line rendering for human-readable output
 */
export function describeValue(value: ConfigValue): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'bool':
    case 'number':
      return String(value.value);
    case 'string':
      return value.value;
    case 'list':
      return `[${value.items.map(describeNested).join(', ')}]`;
    case 'map': {
      const keys = [...value.entries.keys()].sort();
      const parts = keys.map(key => {
        const entry = value.entries.get(key);
        return `${key}: ${entry === undefined ? 'null' : describeNested(entry)}`;
      });
      return `{${parts.join(', ')}}`;
    }
  }
}

// Nested strings are quoted so that "8" and 8 read differently
function describeNested(value: ConfigValue): string {
  return value.kind === 'string' ? JSON.stringify(value.value) : describeValue(value);
}

function isIterable(input: object): input is Iterable<readonly [string, ConfigValue]> {
  return Symbol.iterator in input;
}
