import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { CSVGenerator } from "../src/services/csvGenerator.js";
import { REPORT_SHEET_NAME, XLSXGenerator } from "../src/services/xlsxGenerator.js";
import type { ReportRow } from "../src/types/index.js";

const rows: ReportRow[] = [
  { file: "setembro.pdf", date: "01/09/2025", balance: "15043,90" },
  { file: "vazio.pdf", date: "N/A", balance: "Saldo não encontrado" },
];

describe("XLSXGenerator", () => {
  const generator = new XLSXGenerator();

  it("writes one sheet with the report header and one line per row", () => {
    const buffer = generator.generateXLSX(rows);

    const workbook = XLSX.read(buffer, { type: "buffer" });
    expect(workbook.SheetNames).toEqual([REPORT_SHEET_NAME]);

    const sheet = workbook.Sheets[REPORT_SHEET_NAME];
    const lines = XLSX.utils.sheet_to_json<string[]>(sheet, { header: 1 });

    expect(lines).toEqual([
      ["Arquivo", "Data", "Saldo do Dia"],
      ["setembro.pdf", "01/09/2025", "15043,90"],
      ["vazio.pdf", "N/A", "Saldo não encontrado"],
    ]);
  });

  it("refuses an empty report", () => {
    expect(() => generator.generateXLSX([])).toThrow("No report rows to convert");
  });
});

describe("CSVGenerator", () => {
  it("quotes balances that contain the decimal comma", () => {
    const csv = new CSVGenerator().generateCSV(rows);

    expect(csv).toBe(
      'Arquivo,Data,Saldo do Dia\nsetembro.pdf,01/09/2025,"15043,90"\nvazio.pdf,N/A,Saldo não encontrado\n'
    );
  });
});
