export interface BalanceRecord {
  date: string;
  balance: string;
}

export type ExtractionResult =
  | { status: "found"; records: BalanceRecord[] }
  | { status: "read_error"; message: string };

export interface ReportRow {
  file: string;
  date: string;
  balance: string;
}

export interface Report {
  rows: ReportRow[];
  generatedAt: Date | null;
}

export interface UploadedStatement {
  name: string;
  buffer: Buffer;
}

export interface PageReader {
  readPages(buffer: Buffer): Promise<string[]>;
}

export interface ProcessingProgress {
  file: string;
  index: number;
  processed: number;
  total: number;
  fraction: number;
}

export interface FileError {
  file: string;
  message: string;
}

export interface BatchOutcome {
  report: Report;
  errors: FileError[];
}

export interface ReportSummary {
  files: number;
  balancesFound: number;
  notFound: number;
  readErrors: number;
}
