import { CANONICAL_FIELDS, EDITABLE_FIELDS } from '../constants.js';
import type { CanonicalField, EditableField } from '../types/jama.js';

function squash(name: string): string {
  return name
    .replace(/\$\d+$/, '')
    .toLowerCase()
    .replace(/[\s_\-.]+/g, '');
}

const CANONICAL_BY_SQUASHED = new Map<string, CanonicalField>(
  CANONICAL_FIELDS.map(field => [squash(field), field]),
);

/**
 * Map any spelling of a field name onto its canonical key.
 * `Target-System`, `targetSystem` and `target_system$118` all become
 * `target_system`. Unknown names return undefined.
 */
export function canonicalFieldName(name: string): CanonicalField | undefined {
  return CANONICAL_BY_SQUASHED.get(squash(name));
}

export function isEditableField(field: CanonicalField): field is EditableField {
  return EDITABLE_FIELDS.some(editable => editable === field);
}

/**
 * Render a remote field value as cell text. Lists become comma-separated.
 */
export function fieldValueToText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return value.map(fieldValueToText).filter(Boolean).join(',');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Canonicalize a remote field mapping. The first key that maps onto a
 * canonical field wins; keys that map onto nothing are reported back.
 */
export function normalizeFields(raw: Record<string, unknown>): {
  fields: Partial<Record<CanonicalField, string>>;
  unrecognized: string[];
} {
  const fields: Partial<Record<CanonicalField, string>> = {};
  const unrecognized: string[] = [];

  for (const [key, value] of Object.entries(raw)) {
    const canonical = canonicalFieldName(key);
    if (!canonical) {
      unrecognized.push(key);
      continue;
    }
    if (fields[canonical] === undefined) {
      fields[canonical] = fieldValueToText(value);
    }
  }

  return { fields, unrecognized };
}

/**
 * Translate canonical field names to the keys the remote store expects.
 */
export function toRemoteFields(
  fields: Partial<Record<CanonicalField | 'name', string>>,
  keyMap: Partial<Record<CanonicalField, string>>,
): Record<string, string> {
  const remote: Record<string, string> = {};
  for (const [field, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const canonical = canonicalFieldName(field);
    const key = canonical ? keyMap[canonical] ?? canonical : field;
    remote[key] = value;
  }
  return remote;
}
