import { describe, expect, it } from 'vitest';

import type { AggregatedOrder } from '../src/aggregate';
import { sequenceLabelCards } from '../src/cards';
import { LETTER_LABEL_GRID } from '../src/constants';
import { cellsPerPage, drawLabelCard, layoutLabelPages, placeCell } from '../src/layout';
import { RecordingSurface } from './stubs/surface';

const round = (value: number) => Math.round(value * 100) / 100;

function guests(count: number): AggregatedOrder[] {
  return Array.from({ length: count }, (_, index) => ({
    name: `Guest ${String(index + 1).padStart(2, '0')}`,
    carryOut: 1,
    dineIn: 0
  }));
}

describe('placeCell', () => {
  it('walks columns first, then rows, then pages', () => {
    expect(cellsPerPage(LETTER_LABEL_GRID)).toBe(30);

    for (let index = 0; index < 95; index += 1) {
      const cell = placeCell(index);
      const position = index % 30;
      expect(cell.page).toBe(Math.floor(index / 30));
      expect(cell.column).toBe(position % 3);
      expect(cell.row).toBe(Math.floor(position / 3));
    }
  });

  it('derives cell origins from margins, cell size and gaps', () => {
    const second = placeCell(4);
    expect([second.column, second.row]).toEqual([1, 1]);
    expect(round(second.x)).toBe(210.6);
    expect(round(second.y)).toBe(100.8);

    const last = placeCell(59);
    expect([last.page, last.column, last.row]).toEqual([1, 2, 9]);
    expect(round(last.x)).toBe(406.8);
    expect(round(last.y)).toBe(676.8);

    const nextPage = placeCell(30);
    expect([nextPage.page, nextPage.column, nextPage.row]).toEqual([1, 0, 0]);
    expect(round(nextPage.x)).toBe(14.4);
    expect(round(nextPage.y)).toBe(28.8);
  });
});

describe('layoutLabelPages', () => {
  it('spills the 31st card and the pack summary onto a second page', () => {
    const { cards } = sequenceLabelCards(guests(31));
    const pages = layoutLabelPages(cards);

    expect(pages).toHaveLength(2);
    expect(pages[0]?.cards).toHaveLength(30);
    expect(pages[0]?.cards.map(({ cell }) => cell.index)).toEqual(Array.from({ length: 30 }, (_, index) => index));
    expect(pages[1]?.cards.map(({ card }) => card)).toEqual([
      { kind: 'primary', name: 'Guest 31', count: 1 },
      { kind: 'pack-summary', name: 'Pack Summary', doubles: 0, singles: 31 }
    ]);
    expect(pages[1]?.cards.map(({ cell }) => [cell.index, cell.column, cell.row])).toEqual([
      [30, 0, 0],
      [31, 1, 0]
    ]);
  });

  it('fills exactly one page when the card count matches its capacity', () => {
    const { cards } = sequenceLabelCards(guests(29));

    expect(cards).toHaveLength(30);
    expect(layoutLabelPages(cards)).toHaveLength(1);
  });

  it('returns no pages for an empty sequence', () => {
    expect(layoutLabelPages([])).toEqual([]);
  });

  it('honours a smaller grid', () => {
    const grid = { ...LETTER_LABEL_GRID, columns: 2, rows: 2 };
    const { cards } = sequenceLabelCards(guests(4));

    expect(layoutLabelPages(cards, grid).map((page) => page.cards.length)).toEqual([4, 1]);
  });
});

describe('drawLabelCard', () => {
  const cell = placeCell(0);

  it('puts the name near the top and the count below the midline', () => {
    const surface = new RecordingSurface();
    drawLabelCard(surface, { kind: 'primary', name: 'Ivy', count: 4 }, cell, LETTER_LABEL_GRID);

    expect(surface.calls.map((call) => (call.op === 'text' ? [call.text, round(call.x), round(call.y), call.style.size] : []))).toEqual([
      ['Ivy', 14.4, 43.2, 12],
      ['4', 14.4, 61.8, 12]
    ]);
    expect(surface.calls[0]).toMatchObject({
      style: { font: 'Helvetica-Bold', width: 189, align: 'center' }
    });
  });

  it('centres the name of a continuation card', () => {
    const surface = new RecordingSurface();
    drawLabelCard(surface, { kind: 'continuation', name: 'Ivy', count: null }, cell, LETTER_LABEL_GRID);

    expect(surface.calls).toHaveLength(1);
    expect(surface.textsOn(0)).toEqual(['Ivy']);
    expect(round(surface.calls[0]?.y ?? 0)).toBe(58.8);
  });

  it('prints pack totals under the summary title', () => {
    const surface = new RecordingSurface();
    drawLabelCard(
      surface,
      { kind: 'pack-summary', name: 'Pack Summary', doubles: 6, singles: 3 },
      placeCell(5),
      LETTER_LABEL_GRID
    );

    expect(surface.calls.map((call) => (call.op === 'text' ? [call.text, round(call.y), call.style.font, call.style.size] : []))).toEqual([
      ['Pack Summary', 115.2, 'Helvetica-Bold', 12],
      ['Doubles: 6', 133.2, 'Helvetica', 10],
      ['Singles: 3', 147.2, 'Helvetica', 10]
    ]);
  });
});
