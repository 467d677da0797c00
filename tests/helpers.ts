/**
 * Test helpers: builds small statement PDFs in memory.
 */

import PDFDocument from "pdfkit";

/** A line is either one string, or columns placed at their own x offset. */
export type StatementLine = string | Array<[x: number, text: string]>;

export function statementPdf(pages: StatementLine[][]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "A4", margin: 40, autoFirstPage: false });
    const chunks: Buffer[] = [];

    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    for (const lines of pages) {
      doc.addPage();
      doc.font("Helvetica").fontSize(10);

      lines.forEach((line, index) => {
        const y = 60 + index * 20;
        const columns: Array<[number, string]> = typeof line === "string" ? [[40, line]] : line;
        for (const [x, text] of columns) {
          doc.text(text, x, y, { lineBreak: false });
        }
      });
    }

    doc.end();
  });
}
