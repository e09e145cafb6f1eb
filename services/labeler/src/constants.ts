export const POINTS_PER_INCH = 72;

const inch = (value: number) => value * POINTS_PER_INCH;

export interface PageSize {
  width: number;
  height: number;
}

export const LETTER: PageSize = { width: inch(8.5), height: inch(11) };

export interface LabelGrid {
  page: PageSize;
  columns: number;
  rows: number;
  cellWidth: number;
  cellHeight: number;
  horizontalGap: number;
  verticalGap: number;
  marginX: number;
  marginY: number;
}

/** 3 x 10 letter sheet (2.625in x 1in labels). */
export const LETTER_LABEL_GRID: Readonly<LabelGrid> = Object.freeze({
  page: LETTER,
  columns: 3,
  rows: 10,
  cellWidth: inch(2.625),
  cellHeight: inch(1),
  horizontalGap: inch(0.1),
  verticalGap: 0,
  marginX: inch(0.2),
  marginY: inch(0.4)
});

export const CONTENT_PADDING = inch(0.2);

export const TITLE_FONT = 'Helvetica-Bold';
export const BODY_FONT = 'Helvetica';
export const TITLE_FONT_SIZE = 12;
export const BODY_FONT_SIZE = 10;
export const COUNT_FONT_SIZE = 12;
export const SUMMARY_TITLE_FONT_SIZE = 18;
export const SUMMARY_BODY_FONT_SIZE = 11;

export const PACK_SUMMARY_TITLE = 'Pack Summary';

/** Upper bound on cards per sheet (100 full letter pages). */
export const MAX_LABEL_CARDS = 3000;
export const DINE_IN_SUMMARY_TITLE = 'Dine-In Summary';
export const NO_DINE_IN_MESSAGE = 'No dine-in orders.';
