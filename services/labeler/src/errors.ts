import type { CanonicalField } from './schema';

export class SchemaError extends Error {
  readonly missing: CanonicalField[];

  constructor(missing: CanonicalField[]) {
    super(`Missing required columns: ${missing.join(', ')}`);
    this.name = 'SchemaError';
    this.missing = missing;
  }
}

export class EmptyInputError extends Error {
  constructor(message = 'The uploaded workbook does not contain any rows to print.') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export class LabelLimitError extends Error {
  readonly required: number;
  readonly limit: number;

  constructor(required: number, limit: number) {
    super(`The orders need ${required} labels, more than the ${limit} a sheet can hold.`);
    this.name = 'LabelLimitError';
    this.required = required;
    this.limit = limit;
  }
}
