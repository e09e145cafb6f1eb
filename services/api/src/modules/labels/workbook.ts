import type { RawOrderRow } from '@label-sheet/labeler';
import { read, utils, type WorkSheet } from 'xlsx';

export const ALLOWED_EXTENSIONS = new Set(['xls', 'xlsx']);

export interface OrderTable {
  headers: string[];
  rows: RawOrderRow[];
}

export class WorkbookError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkbookError';
  }
}

export function isAllowedWorkbook(filename: string): boolean {
  const dot = filename.lastIndexOf('.');
  return dot >= 0 && ALLOWED_EXTENSIONS.has(filename.slice(dot + 1).toLowerCase());
}

function readHeaders(sheet: WorkSheet): string[] {
  const [first] = utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    rawNumbers: true,
    defval: '',
    blankrows: false
  });
  return (first ?? []).map((cell) => String(cell));
}

/**
 * Reads the first sheet keyed by its header row. Numeric cells keep their stored value so
 * display formats such as `#,##0` do not leak into counts; other cells come back as text
 * and blanks as empty strings.
 */
export function readWorkbook(buffer: Buffer): OrderTable {
  let sheet: WorkSheet | undefined;
  try {
    const workbook = read(buffer, { type: 'buffer' });
    const [firstName] = workbook.SheetNames;
    sheet = firstName === undefined ? undefined : workbook.Sheets[firstName];
  } catch (error) {
    throw new WorkbookError(error instanceof Error ? error.message : String(error), { cause: error });
  }

  if (!sheet) {
    throw new WorkbookError('workbook has no sheets');
  }

  return {
    headers: readHeaders(sheet),
    rows: utils.sheet_to_json<Record<string, string | number>>(sheet, {
      raw: false,
      rawNumbers: true,
      defval: '',
      blankrows: false
    })
  };
}
