import { cellText, type CellValue } from '@label-sheet/lib';

import { SchemaError } from './errors';

export type CanonicalField = 'name' | 'carry_out' | 'dine_in';

export const CANONICAL_FIELDS: readonly CanonicalField[] = ['name', 'carry_out', 'dine_in'];

export type RawOrderRow = Readonly<Record<string, CellValue>>;

export type CanonicalOrderRow = Record<CanonicalField, string>;

export type ColumnAliases = Readonly<Record<string, CanonicalField>>;

export type ColumnMapping = Record<CanonicalField, string>;

/** Accepted header spellings, matched after {@link headerKey}. Earlier entries win. */
export const DEFAULT_COLUMN_ALIASES: ColumnAliases = {
  name: 'name',
  customer: 'name',
  'carry out': 'carry_out',
  carryout: 'carry_out',
  'carry-out': 'carry_out',
  'dine in': 'dine_in',
  'dine-in': 'dine_in',
  dinein: 'dine_in'
};

export function headerKey(header: string): string {
  return header.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function resolveColumns(headers: Iterable<string>, aliases: ColumnAliases = DEFAULT_COLUMN_ALIASES): ColumnMapping {
  const lookup = new Map<string, string>();
  for (const header of headers) {
    const key = headerKey(header);
    if (!lookup.has(key)) {
      lookup.set(key, header);
    }
  }

  const resolved: Partial<ColumnMapping> = {};
  for (const [alias, field] of Object.entries(aliases)) {
    const header = lookup.get(alias);
    if (header !== undefined && resolved[field] === undefined) {
      resolved[field] = header;
    }
  }

  const { name, carry_out, dine_in } = resolved;
  if (name === undefined || carry_out === undefined || dine_in === undefined) {
    throw new SchemaError(CANONICAL_FIELDS.filter((field) => resolved[field] === undefined));
  }

  return { name, carry_out, dine_in };
}

export function collectHeaders(rows: readonly RawOrderRow[]): string[] {
  const headers = new Set<string>();
  for (const row of rows) {
    for (const header of Object.keys(row)) {
      headers.add(header);
    }
  }
  return [...headers];
}

export interface NormalizeOptions {
  headers?: readonly string[];
  aliases?: ColumnAliases;
}

export function normalizeOrderRows(rows: readonly RawOrderRow[], options: NormalizeOptions = {}): CanonicalOrderRow[] {
  const mapping = resolveColumns(options.headers ?? collectHeaders(rows), options.aliases);

  return rows.map((row) => ({
    name: cellText(row[mapping.name]),
    carry_out: cellText(row[mapping.carry_out]),
    dine_in: cellText(row[mapping.dine_in])
  }));
}
