import { ExtractionResult, Report, ReportRow, ReportSummary } from "../types/index.js";

export const NOT_AVAILABLE = "N/A";
export const BALANCE_NOT_FOUND = "Saldo não encontrado";
export const READ_ERROR = "Erro ao ler PDF";

const SENTINEL_BALANCES: ReadonlySet<string> = new Set([BALANCE_NOT_FOUND, READ_ERROR]);

export function isSentinelBalance(balance: string): boolean {
  return SENTINEL_BALANCES.has(balance);
}

export function emptyReport(): Report {
  return { rows: [], generatedAt: null };
}

export class ReportBuilder {
  buildRows(documentName: string, result: ExtractionResult): ReportRow[] {
    if (result.status === "read_error") {
      return [{ file: documentName, date: NOT_AVAILABLE, balance: READ_ERROR }];
    }

    if (result.records.length === 0) {
      return [{ file: documentName, date: NOT_AVAILABLE, balance: BALANCE_NOT_FOUND }];
    }

    return result.records.map((record) => ({
      file: documentName,
      date: record.date,
      balance: record.balance,
    }));
  }

  partitionRows(rows: ReportRow[]): { success: ReportRow[]; failures: ReportRow[] } {
    const success: ReportRow[] = [];
    const failures: ReportRow[] = [];

    for (const row of rows) {
      if (isSentinelBalance(row.balance)) {
        failures.push(row);
      } else {
        success.push(row);
      }
    }

    return { success, failures };
  }

  summarize(report: Report): ReportSummary {
    const files = new Set(report.rows.map((row) => row.file));
    let balancesFound = 0;
    let notFound = 0;
    let readErrors = 0;

    for (const row of report.rows) {
      if (row.balance === BALANCE_NOT_FOUND) notFound++;
      else if (row.balance === READ_ERROR) readErrors++;
      else balancesFound++;
    }

    return { files: files.size, balancesFound, notFound, readErrors };
  }
}
