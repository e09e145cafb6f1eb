import type { DineInSummaryEntry } from './aggregate';
import {
  BODY_FONT,
  DINE_IN_SUMMARY_TITLE,
  NO_DINE_IN_MESSAGE,
  SUMMARY_BODY_FONT_SIZE,
  SUMMARY_TITLE_FONT_SIZE,
  TITLE_FONT,
  type LabelGrid
} from './constants';
import { tableRowHeight, type DrawingSurface, type TableSpec, type TableStyle } from './surface';

export interface SummaryPage {
  readonly kind: 'summary';
  readonly title: string;
  readonly entries: readonly DineInSummaryEntry[];
}

export const SUMMARY_TABLE_STYLE: TableStyle = {
  headerFont: TITLE_FONT,
  bodyFont: BODY_FONT,
  fontSize: SUMMARY_BODY_FONT_SIZE,
  headerBackground: '#d3d3d3',
  rowBackgrounds: ['#ffffff', '#f3f4f6'],
  borderColor: '#808080',
  boxWidth: 1,
  gridWidth: 0.5,
  paddingX: 8,
  paddingY: 6
};

export function summaryTableTop(grid: LabelGrid): number {
  return grid.marginY + SUMMARY_TITLE_FONT_SIZE + 12;
}

/** Body rows that fit under the header row on one summary page. */
export function summaryRowsPerPage(grid: LabelGrid, style: TableStyle = SUMMARY_TABLE_STYLE): number {
  const available = grid.page.height - summaryTableTop(grid) - grid.marginY;
  return Math.max(1, Math.floor(available / tableRowHeight(style)) - 1);
}

export function buildSummaryPages(entries: readonly DineInSummaryEntry[], grid: LabelGrid): SummaryPage[] {
  if (!entries.length) {
    return [{ kind: 'summary', title: DINE_IN_SUMMARY_TITLE, entries: [] }];
  }

  const perPage = summaryRowsPerPage(grid);
  const pages: SummaryPage[] = [];
  for (let start = 0; start < entries.length; start += perPage) {
    pages.push({
      kind: 'summary',
      title: start === 0 ? DINE_IN_SUMMARY_TITLE : `${DINE_IN_SUMMARY_TITLE} (continued)`,
      entries: entries.slice(start, start + perPage)
    });
  }
  return pages;
}

export function summaryTable(entries: readonly DineInSummaryEntry[], grid: LabelGrid): TableSpec {
  const availableWidth = grid.page.width - 2 * grid.marginX;
  return {
    columns: [
      { header: 'Name', width: availableWidth * 0.7, align: 'left' },
      { header: 'Number', width: availableWidth * 0.3, align: 'center' }
    ],
    rows: entries.map((entry) => [entry.name, String(entry.count)]),
    style: SUMMARY_TABLE_STYLE
  };
}

export function drawSummaryPage(surface: DrawingSurface, page: SummaryPage, grid: LabelGrid): void {
  surface.drawText(page.title, grid.marginX, grid.marginY, { font: TITLE_FONT, size: SUMMARY_TITLE_FONT_SIZE });

  const top = summaryTableTop(grid);
  if (!page.entries.length) {
    surface.drawText(NO_DINE_IN_MESSAGE, grid.marginX, top, { font: BODY_FONT, size: SUMMARY_BODY_FONT_SIZE });
    return;
  }

  surface.drawTable(summaryTable(page.entries, grid), grid.marginX, top);
}
