/**
 * PDF reading tests
 *
 * Runs generated statement PDFs through pdf-parse and the balance extractor.
 */

import { describe, it, expect } from "vitest";
import { BalanceExtractor } from "../src/services/balanceExtractor.js";
import { PDFParser } from "../src/services/pdfParser.js";
import { StatementProcessor } from "../src/services/statementProcessor.js";
import { statementPdf, type StatementLine } from "./helpers.js";

const COLUMN_LINE: StatementLine = [
  [40, "01/09/2025"],
  [110, "123"],
  [150, "SALDO DIA"],
  [260, "0,00 C"],
  [340, "15.043,90 C"],
];

describe("PDFParser", () => {
  const parser = new PDFParser();
  const extractor = new BalanceExtractor();

  it("rejects bytes that are not a PDF document", async () => {
    await expect(parser.readPages(Buffer.from("not a pdf"))).rejects.toThrow(
      /^Failed to parse PDF file/
    );
  });

  it("reads a line written as a single string", async () => {
    const pdf = await statementPdf([["05/09/25 45 SALDO DIA 1.200,50 D 9.876,00"]]);

    const pages = await parser.readPages(pdf);

    expect(extractor.extractFromPages(pages)).toEqual({
      status: "found",
      records: [{ date: "05/09/25", balance: "9876,00" }],
    });
  });

  it("separates columns laid out on the same line", async () => {
    const pdf = await statementPdf([[COLUMN_LINE]]);

    const pages = await parser.readPages(pdf);

    expect(pages).toEqual(["01/09/2025 123 SALDO DIA 0,00 C 15.043,90 C"]);
    expect(extractor.extractFromPages(pages)).toEqual({
      status: "found",
      records: [{ date: "01/09/2025", balance: "15043,90" }],
    });
  });

  it("returns balances from every page in page order", async () => {
    const pdf = await statementPdf([
      ["EXTRATO CONTA CORRENTE", COLUMN_LINE],
      ["EXTRATO CONTA CORRENTE - CONTINUACAO", "02/09/2025 124 SALDO DIA 1.000,00 D 14.043,90 C"],
    ]);

    const pages = await parser.readPages(pdf);

    expect(pages).toHaveLength(2);
    expect(extractor.extractFromPages(pages)).toEqual({
      status: "found",
      records: [
        { date: "01/09/2025", balance: "15043,90" },
        { date: "02/09/2025", balance: "14043,90" },
      ],
    });
  });

  it("reads a buffer that is a slice of a larger allocation", async () => {
    const pdf = await statementPdf([[COLUMN_LINE]]);
    const backing = Buffer.alloc(37 + pdf.length + 1500, "x");
    pdf.copy(backing, 37);
    const slice = backing.subarray(37, 37 + pdf.length);

    expect(slice.byteOffset).toBe(37);
    expect(await parser.readPages(slice)).toEqual(await parser.readPages(pdf));
    expect(await parser.readPages(slice)).toEqual([
      "01/09/2025 123 SALDO DIA 0,00 C 15.043,90 C",
    ]);
  });

  it("feeds real documents through the batch", async () => {
    const processor = new StatementProcessor(parser);
    const withBalance = await statementPdf([[COLUMN_LINE]]);
    const withoutBalance = await statementPdf([["EXTRATO SEM MOVIMENTO"]]);

    const { report } = await processor.processBatch([
      { name: "setembro.pdf", buffer: withBalance },
      { name: "corrompido.pdf", buffer: Buffer.from("not a pdf") },
      { name: "vazio.pdf", buffer: withoutBalance },
    ]);

    expect(report.rows).toEqual([
      { file: "setembro.pdf", date: "01/09/2025", balance: "15043,90" },
      { file: "corrompido.pdf", date: "N/A", balance: "Erro ao ler PDF" },
      { file: "vazio.pdf", date: "N/A", balance: "Saldo não encontrado" },
    ]);
  });
});
