import { tableRowHeight, type DrawingSurface, type TableSpec, type TextStyle } from './surface';

const TEXT_COLOR = '#000000';

export class PdfKitSurface implements DrawingSurface {
  private pages = 1;

  constructor(private readonly doc: PDFKit.PDFDocument) {}

  get pageCount(): number {
    return this.pages;
  }

  addPage(): void {
    this.doc.addPage();
    this.pages += 1;
  }

  drawText(text: string, x: number, y: number, style: TextStyle): void {
    this.doc
      .font(style.font)
      .fontSize(style.size)
      .fillColor(TEXT_COLOR)
      .text(text, x, y, { width: style.width, align: style.align ?? 'left', lineBreak: false });
  }

  drawTable(table: TableSpec, x: number, y: number): void {
    const { style, columns } = table;
    const rowHeight = tableRowHeight(style);
    const width = columns.reduce((acc, column) => acc + column.width, 0);
    const lines = [columns.map((column) => column.header), ...table.rows];
    const height = lines.length * rowHeight;

    for (const [rowIndex, cells] of lines.entries()) {
      const top = y + rowIndex * rowHeight;
      const background =
        rowIndex === 0
          ? style.headerBackground
          : style.rowBackgrounds[(rowIndex - 1) % Math.max(1, style.rowBackgrounds.length)];
      if (background) {
        this.doc.rect(x, top, width, rowHeight).fill(background);
      }

      let left = x;
      for (const [columnIndex, column] of columns.entries()) {
        this.drawText(cells[columnIndex] ?? '', left + style.paddingX, top + style.paddingY, {
          font: rowIndex === 0 ? style.headerFont : style.bodyFont,
          size: style.fontSize,
          width: column.width - style.paddingX * 2,
          align: column.align
        });
        left += column.width;
      }
    }

    this.doc.lineWidth(style.gridWidth).strokeColor(style.borderColor);
    for (let rowIndex = 1; rowIndex < lines.length; rowIndex += 1) {
      const lineY = y + rowIndex * rowHeight;
      this.doc.moveTo(x, lineY).lineTo(x + width, lineY).stroke();
    }
    let divider = x;
    for (const column of columns.slice(0, -1)) {
      divider += column.width;
      this.doc.moveTo(divider, y).lineTo(divider, y + height).stroke();
    }

    this.doc.lineWidth(style.boxWidth).rect(x, y, width, height).stroke();
  }
}
