/**
 * JSON encoding of entity property maps for stores that persist text.
 * Keys are tagged as `{ "$key": [...path] }`; every other value is a JSON
 * scalar or list.
 */

import type { PropertyValue } from '../types.js';
import { isEntityKey } from './key.js';

type Encoded = string | number | boolean | null | Encoded[] | { $key: unknown };

function encodeValue(value: PropertyValue): Encoded {
  if (Array.isArray(value)) return value.map(encodeValue);
  if (isEntityKey(value)) return { $key: value.path };
  return value;
}

function decodeValue(raw: unknown, property: string): PropertyValue {
  if (raw === null || typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
    return raw;
  }
  if (Array.isArray(raw)) return raw.map((v) => decodeValue(v, property));
  if (typeof raw === 'object' && '$key' in raw) {
    const key = { path: raw.$key };
    if (isEntityKey(key)) return key;
  }
  throw new Error(`Cannot decode stored value of property "${property}"`);
}

export function encodeProperties(properties: Record<string, PropertyValue>): string {
  const out: Record<string, Encoded> = {};
  for (const [name, value] of Object.entries(properties)) {
    out[name] = encodeValue(value);
  }
  return JSON.stringify(out);
}

export function decodeProperties(text: string): Record<string, PropertyValue> {
  const raw: unknown = JSON.parse(text);
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Stored properties are not an object');
  }
  const out: Record<string, PropertyValue> = {};
  for (const [name, value] of Object.entries(raw)) {
    out[name] = decodeValue(value, name);
  }
  return out;
}
