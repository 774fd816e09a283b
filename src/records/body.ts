/**
 * HTML body rendering for asset records.
 */

import { AttributeValue, Attributes } from '../domain/analysis';
import { isRecord } from '../domain/values';

/** Attributes shown elsewhere on the record, not in the body. */
const EXCLUDED_FIELDS = new Set(['title', 'tags']);

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** `serial_number` -> `Serial Number` */
export function fieldLabel(key: string): string {
  return key
    .replace(/_/g, ' ')
    .split(' ')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function scalarText(value: AttributeValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function renderValue(value: AttributeValue): string {
  if (Array.isArray(value)) {
    const items = value.map((item) => `<li>${escapeHtml(scalarText(item))}</li>\n`).join('');
    return `<ul>\n${items}</ul>`;
  }
  if (isRecord(value)) {
    const items = Object.entries(value)
      .map(([key, item]) => `<li><strong>${escapeHtml(key)}:</strong> ${escapeHtml(scalarText(item))}</li>\n`)
      .join('');
    return `<ul>\n${items}</ul>`;
  }
  return escapeHtml(scalarText(value));
}

/** Render attributes as the record body, one `asset-field` block per attribute. */
export function renderRecordBody(attributes: Attributes): string {
  let html = "<div class='asset-details'>\n";
  for (const [key, value] of Object.entries(attributes)) {
    if (EXCLUDED_FIELDS.has(key)) continue;
    html += "<div class='asset-field'>\n";
    html += `<h3>${escapeHtml(fieldLabel(key))}</h3>\n`;
    html += `<div class='asset-value'>${renderValue(value)}</div>\n`;
    html += '</div>\n';
  }
  html += '</div>';
  return html;
}

/** Record title from the analysed name, or `fallback` when there is none. */
export function recordTitle(attributes: Attributes, fallback: string): string {
  for (const key of ['title', 'name', 'asset_name']) {
    const value = attributes[key];
    if (typeof value === 'string' && value.trim() && value.trim().toLowerCase() !== 'unknown') {
      return value.trim();
    }
  }
  return fallback;
}

/** String-valued tags from the `tags` attribute. */
export function recordTags(attributes: Attributes): string[] {
  const tags = attributes['tags'];
  if (Array.isArray(tags)) {
    return tags.filter((tag): tag is string => typeof tag === 'string' && tag.trim().length > 0).map((tag) => tag.trim());
  }
  if (typeof tags === 'string') {
    return tags.split(',').map((tag) => tag.trim()).filter((tag) => tag.length > 0);
  }
  return [];
}
