import type { CandidateRecord, CandidateRow, StructuredField } from './types';

type Primitive = string | number | boolean;

const EMPTY_FIELD: StructuredField = { kind: 'flat', items: [] };

function isPrimitive(value: unknown): value is Primitive {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function primitiveText(value: Primitive): string {
  return String(value).trim();
}

function flatFromArray(values: unknown[]): { kind: 'flat'; items: string[] } {
  const items = values
    .filter(isPrimitive)
    .map(primitiveText)
    .filter((item) => item.length > 0);
  return { kind: 'flat', items };
}

function recordFromObject(value: Record<string, unknown>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isPrimitive(entry)) {
      record[key] = primitiveText(entry);
    }
  }
  return record;
}

function decodeArray(values: unknown[]): StructuredField {
  if (values.some(isPlainObject)) {
    return { kind: 'records', items: values.filter(isPlainObject).map(recordFromObject) };
  }
  return flatFromArray(values);
}

function decodeObject(value: Record<string, unknown>): StructuredField {
  const manualList = value.manual_list;
  if (Array.isArray(manualList)) {
    return flatFromArray(manualList);
  }

  const items: string[] = [];
  for (const entry of Object.values(value)) {
    if (typeof entry === 'string' || typeof entry === 'number') {
      const text = primitiveText(entry);
      if (text) {
        items.push(text);
      }
    } else if (Array.isArray(entry)) {
      items.push(...flatFromArray(entry).items);
    }
  }
  return { kind: 'flat', items };
}

function decodeText(value: string): StructuredField {
  const text = value.trim();
  if (!text) {
    return EMPTY_FIELD;
  }

  if (!text.startsWith('[') && !text.startsWith('{')) {
    return { kind: 'flat', items: [text] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return EMPTY_FIELD;
  }

  if (Array.isArray(parsed)) {
    return decodeArray(parsed);
  }
  return isPlainObject(parsed) ? decodeObject(parsed) : EMPTY_FIELD;
}

/**
 * Decodes a semi-structured column value. Never throws; a value of an
 * unexpected shape becomes an empty flat list.
 */
export function decodeStructuredField(value: unknown): StructuredField {
  if (typeof value === 'string') {
    return decodeText(value);
  }

  if (Array.isArray(value)) {
    return decodeArray(value);
  }

  if (isPlainObject(value)) {
    return decodeObject(value);
  }

  return EMPTY_FIELD;
}

/** Flattens a field to plain strings, taking each record's values in order. */
export function fieldToStrings(field: StructuredField): string[] {
  if (field.kind === 'flat') {
    return field.items;
  }

  return field.items
    .map((record) =>
      Object.values(record)
        .filter((entry) => entry.length > 0)
        .join(' ')
    )
    .filter((entry) => entry.length > 0);
}

function toNullableText(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.trim();
  return text.length > 0 ? text : null;
}

function toYears(value: unknown): number | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
}

function toScore(value: unknown): number {
  const parsed = Number(value ?? 0);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function decodeCandidateRow(row: CandidateRow): CandidateRecord {
  return {
    id: String(row.id),
    fullName: toNullableText(row.full_name) ?? '',
    professionalTitle: toNullableText(row.professional_title),
    yearsExperience: toYears(row.years_experience),
    location: toNullableText(row.location),
    languages: fieldToStrings(decodeStructuredField(row.languages)),
    skills: decodeStructuredField(row.skills),
    tools: decodeStructuredField(row.tools),
    projects: decodeStructuredField(row.projects),
    workHistory: decodeStructuredField(row.work_history),
    education: decodeStructuredField(row.education),
    certifications: decodeStructuredField(row.certifications),
    summary: toNullableText(row.summary),
    email: toNullableText(row.email),
    phone: toNullableText(row.phone),
    score: toScore(row.similarity)
  };
}
