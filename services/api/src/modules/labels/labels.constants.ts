import { generateLabelSheetPdf, type LabelSheetOptions, type RawOrderRow } from '@label-sheet/labeler';

import { readWorkbook, type OrderTable } from './workbook';

export const LABELS_PIPELINE = Symbol('LABELS_PIPELINE');

export const UPLOAD_FIELD = 'data_file';

export interface LabelsPipeline {
  readWorkbook(buffer: Buffer): OrderTable;
  renderLabels(rows: readonly RawOrderRow[], options: LabelSheetOptions): Promise<Buffer>;
}

export const defaultLabelsPipeline: LabelsPipeline = {
  readWorkbook,
  renderLabels: generateLabelSheetPdf
};
