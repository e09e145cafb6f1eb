import type { LabelCard } from './cards';
import {
  BODY_FONT,
  BODY_FONT_SIZE,
  CONTENT_PADDING,
  COUNT_FONT_SIZE,
  LETTER_LABEL_GRID,
  TITLE_FONT,
  TITLE_FONT_SIZE,
  type LabelGrid
} from './constants';
import type { DrawingSurface, TextStyle } from './surface';

export interface CellPlacement {
  index: number;
  page: number;
  column: number;
  row: number;
  x: number;
  y: number;
}

export interface PlacedCard {
  readonly card: LabelCard;
  readonly cell: CellPlacement;
}

export interface LabelPage {
  readonly kind: 'labels';
  readonly cards: readonly PlacedCard[];
}

export function cellsPerPage(grid: LabelGrid): number {
  return grid.columns * grid.rows;
}

export function placeCell(index: number, grid: LabelGrid = LETTER_LABEL_GRID): CellPlacement {
  const perPage = cellsPerPage(grid);
  const position = index % perPage;
  const column = position % grid.columns;
  const row = Math.floor(position / grid.columns);

  return {
    index,
    page: Math.floor(index / perPage),
    column,
    row,
    x: grid.marginX + column * (grid.cellWidth + grid.horizontalGap),
    y: grid.marginY + row * (grid.cellHeight + grid.verticalGap)
  };
}

/** Fills each page left-to-right, top-to-bottom before starting the next one. */
export function layoutLabelPages(cards: readonly LabelCard[], grid: LabelGrid = LETTER_LABEL_GRID): LabelPage[] {
  const pages: PlacedCard[][] = [];

  for (const [index, card] of cards.entries()) {
    const cell = placeCell(index, grid);
    if (cell.page === pages.length) {
      pages.push([]);
    }
    pages[cell.page]?.push({ card, cell });
  }

  return pages.map((placed) => ({ kind: 'labels', cards: placed }));
}

export function drawLabelCard(surface: DrawingSurface, card: LabelCard, cell: CellPlacement, grid: LabelGrid): void {
  const title: TextStyle = { font: TITLE_FONT, size: TITLE_FONT_SIZE, width: grid.cellWidth, align: 'center' };

  if (card.kind === 'pack-summary') {
    const body: TextStyle = { font: BODY_FONT, size: BODY_FONT_SIZE, width: grid.cellWidth, align: 'center' };
    const titleY = cell.y + CONTENT_PADDING;
    const doublesY = titleY + TITLE_FONT_SIZE + 6;
    const singlesY = doublesY + BODY_FONT_SIZE + 4;

    surface.drawText(card.name, cell.x, titleY, title);
    surface.drawText(`Doubles: ${card.doubles || 0}`, cell.x, doublesY, body);
    surface.drawText(`Singles: ${card.singles || 0}`, cell.x, singlesY, body);
    return;
  }

  if (card.kind === 'continuation') {
    surface.drawText(card.name, cell.x, cell.y + (grid.cellHeight - TITLE_FONT_SIZE) / 2, title);
    return;
  }

  surface.drawText(card.name, cell.x, cell.y + CONTENT_PADDING, title);
  // count sits just under the cell's midline
  surface.drawText(String(card.count), cell.x, cell.y + grid.cellHeight / 2 - COUNT_FONT_SIZE / 4, {
    ...title,
    size: COUNT_FONT_SIZE
  });
}

export function drawLabelPage(surface: DrawingSurface, page: LabelPage, grid: LabelGrid): void {
  for (const { card, cell } of page.cards) {
    drawLabelCard(surface, card, cell, grid);
  }
}
