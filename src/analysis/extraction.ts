/**
 * Structured attribute extraction from provider output.
 *
 * Providers in JSON mode get a strict parse. Free-form models often wrap
 * JSON in prose or markdown fences, leave trailing commas, or put raw
 * newlines inside strings; the lenient path strips fences, locates the
 * outermost JSON object and repairs those mistakes before parsing.
 * Output with no recognizable object is an InvalidResponse.
 */

import { Attributes, AttributeValue } from '../domain/analysis';
import { PipelineError, invalidResponseError } from '../domain/errors';
import { isRecord, toAttributes } from '../domain/values';

/**
 * Repair common model JSON mistakes:
 * trailing commas before } or ], and unescaped control characters inside strings.
 */
export function repairJSON(raw: string): string {
  const withoutTrailingCommas = raw.replace(/,\s*([}\]])/g, '$1');
  return escapeControlCharsInStrings(withoutTrailingCommas);
}

function escapeControlCharsInStrings(json: string): string {
  const chars: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of json) {
    if (escaped) {
      chars.push(ch);
      escaped = false;
      continue;
    }
    if (ch === '\\' && inString) {
      chars.push(ch);
      escaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      chars.push(ch);
      continue;
    }
    if (inString) {
      const code = ch.charCodeAt(0);
      if (code < 0x20) {
        switch (ch) {
          case '\n': chars.push('\\n'); break;
          case '\r': chars.push('\\r'); break;
          case '\t': chars.push('\\t'); break;
          default:
            chars.push('\\u' + code.toString(16).padStart(4, '0'));
            break;
        }
        continue;
      }
    }
    chars.push(ch);
  }

  return chars.join('');
}

/** The first balanced {...} in `text`, ignoring braces inside strings. */
export function extractOutermostObject(text: string): string | null {
  const startIdx = text.indexOf('{');
  if (startIdx === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = startIdx; i < text.length; i++) {
    const ch = text[i];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\' && inString) {
      escaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (!inString) {
      if (ch === '{') depth++;
      else if (ch === '}') {
        depth--;
        if (depth === 0) return text.slice(startIdx, i + 1);
      }
    }
  }

  return null;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse output that must be exactly one JSON object, as JSON mode returns it.
 */
export function parseStrictJsonObject(raw: string): Record<string, unknown> {
  const parsed = tryParse(raw.trim());
  if (!isRecord(parsed)) {
    throw new PipelineError(invalidResponseError('Provider response is not a single JSON object', raw));
  }
  return parsed;
}

/**
 * Parse the JSON object carried by free-form provider output.
 */
export function extractJsonObject(raw: string): Record<string, unknown> {
  let cleaned = raw.trim();

  const fenceMatch = cleaned.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fenceMatch) {
    cleaned = fenceMatch[1].trim();
  }

  const direct = tryParse(cleaned);
  if (isRecord(direct)) return direct;

  const candidate = extractOutermostObject(cleaned);
  if (!candidate) {
    throw new PipelineError(invalidResponseError('No JSON object found in provider response', raw));
  }

  const parsed = tryParse(candidate) ?? tryParse(repairJSON(candidate));
  if (!isRecord(parsed)) {
    throw new PipelineError(invalidResponseError('Provider response contains malformed JSON', raw));
  }
  return parsed;
}

export interface NormalizedAttributes {
  attributes: Attributes;
  confidence: number;
}

function isUnknown(value: AttributeValue): boolean {
  if (value === null) return true;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    return normalized === '' || normalized === 'unknown';
  }
  return false;
}

/**
 * Turn a parsed provider object into attributes plus a confidence score.
 *
 * The two-part answer `{summary: {asset_name, asset_type}, ...details}` is
 * flattened: the summary name becomes `name` and its type becomes `type`.
 * A numeric `confidence` in 0..1 is taken as given; otherwise confidence is
 * the share of attributes whose value is not "unknown".
 */
export function normalizeAttributes(parsed: Record<string, unknown>, rawOutput = ''): NormalizedAttributes {
  const { summary, confidence: reported, ...rest } = parsed;
  const attributes = toAttributes(rest);

  if (isRecord(summary)) {
    const assetName = summary['asset_name'];
    const assetType = summary['asset_type'];
    if (typeof assetName === 'string' && assetName.trim()) attributes.name = assetName.trim();
    if (typeof assetType === 'string' && assetType.trim() && attributes.type === undefined) {
      attributes.type = assetType.trim();
    }
  }

  const values = Object.values(attributes);
  if (values.length === 0) {
    throw new PipelineError(invalidResponseError('Provider response contained no attributes', rawOutput));
  }

  let confidence: number;
  if (typeof reported === 'number' && reported >= 0 && reported <= 1) {
    confidence = reported;
  } else {
    const known = values.filter((value) => !isUnknown(value)).length;
    confidence = known / values.length;
  }

  return { attributes, confidence };
}
