import PDFDocument from 'pdfkit';

import { aggregateOrders, summarizeDineIn, type AggregatedOrder, type DineInSummaryEntry } from './aggregate';
import { sequenceLabelCards, type LabelCard, type PackSplit, type SequenceOptions } from './cards';
import { LETTER_LABEL_GRID, type LabelGrid } from './constants';
import { drawLabelPage, layoutLabelPages, type LabelPage } from './layout';
import { getLogger } from './logging';
import { PdfKitSurface } from './pdf-surface';
import { normalizeOrderRows, type NormalizeOptions, type RawOrderRow } from './schema';
import { buildSummaryPages, drawSummaryPage, type SummaryPage } from './summary';
import type { DrawingSurface } from './surface';

export type DocumentPage = LabelPage | SummaryPage;

export interface LabelSheetDocument {
  readonly grid: LabelGrid;
  readonly pages: readonly DocumentPage[];
  readonly orders: readonly AggregatedOrder[];
  readonly cards: readonly LabelCard[];
  readonly packs: Readonly<PackSplit>;
  readonly dineIn: readonly DineInSummaryEntry[];
}

export interface LabelSheetOptions extends NormalizeOptions, SequenceOptions {
  grid?: LabelGrid;
}

const logger = getLogger();

/**
 * Builds the page model for a label sheet: label grid pages for every carry-out card,
 * then the dine-in summary. Throws {@link SchemaError} when a required column is missing
 * and {@link LabelLimitError} when the orders need more than `maxCards` labels.
 */
export function buildLabelSheet(rows: readonly RawOrderRow[], options: LabelSheetOptions = {}): LabelSheetDocument {
  const grid = options.grid ?? LETTER_LABEL_GRID;
  const orders = aggregateOrders(normalizeOrderRows(rows, options));
  const { cards, totals } = sequenceLabelCards(orders, options);
  const dineIn = summarizeDineIn(orders);

  const pages: DocumentPage[] = [...layoutLabelPages(cards, grid), ...buildSummaryPages(dineIn, grid)];

  return Object.freeze({
    grid,
    pages: Object.freeze(pages),
    orders,
    cards,
    packs: Object.freeze({ ...totals }),
    dineIn
  });
}

export function renderLabelSheet(document: LabelSheetDocument, surface: DrawingSurface): void {
  for (const [index, page] of document.pages.entries()) {
    if (index > 0) {
      surface.addPage();
    }
    if (page.kind === 'labels') {
      drawLabelPage(surface, page, document.grid);
    } else {
      drawSummaryPage(surface, page, document.grid);
    }
  }
}

export function createPdfDocument(grid: LabelGrid): PDFKit.PDFDocument {
  return new PDFDocument({ size: [grid.page.width, grid.page.height], margin: 0 });
}

/** Streams the sheet into a Buffer. The document is ended even when drawing fails. */
export function renderLabelSheetPdf(
  document: LabelSheetDocument,
  doc: PDFKit.PDFDocument = createPdfDocument(document.grid)
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const buffers: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => buffers.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(buffers)));
    doc.on('error', reject);

    try {
      renderLabelSheet(document, new PdfKitSurface(doc));
      doc.end();
    } catch (error) {
      reject(error);
      doc.end();
    }
  });
}

export async function generateLabelSheetPdf(rows: readonly RawOrderRow[], options: LabelSheetOptions = {}): Promise<Buffer> {
  const document = buildLabelSheet(rows, options);
  const labelPages = document.pages.filter((page) => page.kind === 'labels').length;

  logger.info(
    {
      orders: document.orders.length,
      cards: document.cards.length,
      labelPages,
      summaryPages: document.pages.length - labelPages,
      doubles: document.packs.doubles,
      singles: document.packs.singles
    },
    'label sheet built'
  );

  return renderLabelSheetPdf(document);
}
