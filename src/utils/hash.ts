import { createHash } from 'node:crypto';
import { SerializationError } from '../errors.js';

export function canonicalize(value: unknown): string {
  return serialize(value, '$', new Set());
}

function serialize(value: unknown, path: string, ancestors: Set<object>): string {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(`Cannot serialize non-finite number ${value}`, path);
    }
    return JSON.stringify(value);
  }

  if (typeof value !== 'object') {
    throw new SerializationError(`Cannot serialize value of type ${typeof value}`, path);
  }

  if (ancestors.has(value)) {
    throw new SerializationError('Cannot serialize circular reference', path);
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((item, index) => serialize(item, `${path}[${index}]`, ancestors)).join(',')}]`;
    }

    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype !== Object.prototype && prototype !== null) {
      throw new SerializationError(`Cannot serialize ${value.constructor?.name ?? 'Object'} instance`, path);
    }

    const entries = Object.entries(value).sort(([a], [b]) => compareKeys(a, b));
    const serialized = entries
      .map(([key, val]) => `${JSON.stringify(key)}:${serialize(val, `${path}.${key}`, ancestors)}`)
      .join(',');
    return `{${serialized}}`;
  } finally {
    ancestors.delete(value);
  }
}

// Code-unit order, so the result does not depend on the host locale.
function compareKeys(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

export function digestText(text: string, algorithm: string = 'sha256'): string {
  return createHash(algorithm).update(text).digest('hex');
}

export function checksumFrom(value: unknown, algorithm: string = 'sha256'): string {
  return digestText(canonicalize(value), algorithm);
}
