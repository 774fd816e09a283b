/**
 * Narrowing helpers for untyped JSON coming from providers, the record
 * system and request bodies.
 */

import { AttributeValue, Attributes } from './analysis';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Convert parsed JSON into an AttributeValue; functions, symbols and undefined are dropped. */
export function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (value === null) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'object': {
      if (Array.isArray(value)) {
        const items: AttributeValue[] = [];
        for (const item of value) {
          const converted = toAttributeValue(item);
          if (converted !== undefined) items.push(converted);
        }
        return items;
      }
      return isRecord(value) ? toAttributes(value) : undefined;
    }
    default:
      return undefined;
  }
}

export function toAttributes(value: Record<string, unknown>): Attributes {
  const out: Attributes = {};
  for (const [key, raw] of Object.entries(value)) {
    const converted = toAttributeValue(raw);
    if (converted !== undefined) out[key] = converted;
  }
  return out;
}

export function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
