import { NONE_TEXT } from '../domain/index.js';
import type { PayloadRecord } from '../domain/index.js';

/**
 * Total accessors over an untrusted JSON document.
 *
 * None of these throw: a missing key or a value of the wrong kind yields
 * the zero value for the requested shape.
 */

function isRecord(value: unknown): value is PayloadRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Textual form of any JSON value.
 *
 * null and undefined render as NONE_TEXT; scalars use their canonical
 * string form; objects and arrays are re-serialised as JSON.
 */
export function toText(value: unknown): string {
  if (value === null || value === undefined) return NONE_TEXT;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? NONE_TEXT;
  } catch {
    return NONE_TEXT;
  }
}

/** String at `key`, or '' when absent or not a string. */
export function getString(source: PayloadRecord, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

/** Any value at `key` rendered through toText(). */
export function getText(source: PayloadRecord, key: string): string {
  return toText(source[key]);
}

/** Nested object at `key`, or {} when absent or not an object. */
export function getRecord(source: PayloadRecord, key: string): PayloadRecord {
  const value = source[key];
  return isRecord(value) ? value : {};
}

/** Array at `key`, or [] when absent or not an array. */
export function getArray(source: PayloadRecord, key: string): readonly unknown[] {
  const value = source[key];
  return Array.isArray(value) ? value : [];
}

/** Objects in the array at `key`; non-object entries are skipped. */
export function getRecordArray(source: PayloadRecord, key: string): PayloadRecord[] {
  return getArray(source, key).filter(isRecord);
}

/**
 * Parses a request body into a payload record.
 *
 * Malformed JSON, or JSON whose top level is not an object, yields {}.
 */
export function parsePayload(raw: Buffer | string): PayloadRecord {
  const text = typeof raw === 'string' ? raw : raw.toString('utf-8');
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
