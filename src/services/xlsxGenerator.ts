import * as XLSX from "xlsx";
import { ReportRow } from "../types/index.js";

export const REPORT_COLUMNS = ["Arquivo", "Data", "Saldo do Dia"] as const;
export const REPORT_SHEET_NAME = "Saldos Extraídos";
export const REPORT_FILE_NAME = "relatorio_saldos_extraidos.xlsx";
export const XLSX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export class XLSXGenerator {
  generateXLSX(rows: ReportRow[]): Buffer {
    if (rows.length === 0) {
      throw new Error("No report rows to convert");
    }

    // Header row followed by one line per report row, no index column
    const worksheetData = [
      [...REPORT_COLUMNS],
      ...rows.map((row) => [row.file, row.date, row.balance]),
    ];

    const worksheet = XLSX.utils.aoa_to_sheet(worksheetData);

    worksheet["!cols"] = [
      { wch: 40 }, // Arquivo
      { wch: 12 }, // Data
      { wch: 22 }, // Saldo do Dia
    ];

    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, worksheet, REPORT_SHEET_NAME);

    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });

    return buffer;
  }
}
