import { stringify } from "csv-stringify/sync";
import { ReportRow } from "../types/index.js";
import { REPORT_COLUMNS } from "./xlsxGenerator.js";

export class CSVGenerator {
  generateCSV(rows: ReportRow[]): string {
    if (rows.length === 0) {
      throw new Error("No report rows to convert");
    }

    const records = rows.map((row) => ({
      Arquivo: row.file,
      Data: row.date,
      "Saldo do Dia": row.balance,
    }));

    return stringify(records, {
      header: true,
      columns: [...REPORT_COLUMNS],
    });
  }
}
