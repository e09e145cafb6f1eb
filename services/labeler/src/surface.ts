export type TextAlign = 'left' | 'center' | 'right';

export interface TextStyle {
  font: string;
  size: number;
  /** Box width used for alignment; text is drawn on a single line. */
  width?: number;
  align?: TextAlign;
}

export interface TableColumn {
  header: string;
  width: number;
  align: TextAlign;
}

export interface TableStyle {
  headerFont: string;
  bodyFont: string;
  fontSize: number;
  headerBackground: string;
  rowBackgrounds: readonly string[];
  borderColor: string;
  boxWidth: number;
  gridWidth: number;
  paddingX: number;
  paddingY: number;
}

export interface TableSpec {
  columns: readonly TableColumn[];
  rows: readonly (readonly string[])[];
  style: TableStyle;
}

/**
 * Drawing primitives the label sheet renders onto. Coordinates are points with the
 * origin at the top-left corner of the current page.
 */
export interface DrawingSurface {
  drawText(text: string, x: number, y: number, style: TextStyle): void;
  drawTable(table: TableSpec, x: number, y: number): void;
  addPage(): void;
}

export function tableRowHeight(style: TableStyle): number {
  return style.fontSize + style.paddingY * 2;
}
