import { Request, Response } from "express";
import { ReportStore } from "../db/memoryStore.js";
import { CSVGenerator } from "../services/csvGenerator.js";
import { SESSION_HEADER } from "../middleware/sessionMiddleware.js";
import { ReportBuilder, emptyReport } from "../services/reportBuilder.js";
import { StatementProcessor } from "../services/statementProcessor.js";
import {
  REPORT_FILE_NAME,
  XLSXGenerator,
  XLSX_MIME_TYPE,
} from "../services/xlsxGenerator.js";
import { ProcessingProgress, Report, ReportRow, UploadedStatement } from "../types/index.js";

export const EMPTY_BATCH_MESSAGE = "Por favor, faça upload de pelo menos um arquivo PDF.";

function toTableRow(row: ReportRow) {
  return {
    Arquivo: row.file,
    Data: row.date,
    "Saldo do Dia": row.balance,
  };
}

function toFailureRow(row: ReportRow) {
  return {
    Arquivo: row.file,
    "Saldo do Dia": row.balance,
  };
}

function uploadedFiles(req: Request): UploadedStatement[] {
  if (!Array.isArray(req.files)) return [];
  return req.files.map((file) => ({ name: file.originalname, buffer: file.buffer }));
}

export class UploadController {
  private reportBuilder: ReportBuilder;
  private csvGenerator: CSVGenerator;
  private xlsxGenerator: XLSXGenerator;

  constructor(
    private readonly processor: StatementProcessor,
    private readonly store: ReportStore
  ) {
    this.reportBuilder = new ReportBuilder();
    this.csvGenerator = new CSVGenerator();
    this.xlsxGenerator = new XLSXGenerator();
  }

  // Reads never create a session; callers without one see an empty report
  private currentReport(req: Request): Report {
    const report = req.sessionId ? this.store.get(req.sessionId) : undefined;
    return report ?? emptyReport();
  }

  private describeReport(report: Report) {
    const { success, failures } = this.reportBuilder.partitionRows(report.rows);
    return {
      rows: report.rows.map(toTableRow),
      success_rows: success.map(toTableRow),
      failure_rows: failures.map(toFailureRow),
      summary: this.reportBuilder.summarize(report),
      generatedAt: report.generatedAt ? report.generatedAt.toISOString() : null,
    };
  }

  async processFiles(req: Request, res: Response): Promise<void> {
    const files = uploadedFiles(req);

    console.log("=== Process Request Received ===");
    console.log("Session:", req.sessionId ?? "(new)");
    console.log("Files:", files.length);

    if (files.length === 0) {
      console.warn("No files uploaded; keeping the current report");
      res.status(200).json({ success: false, warning: EMPTY_BATCH_MESSAGE, code: "EMPTY_BATCH" });
      return;
    }

    const progress: ProcessingProgress[] = [];
    const { report, errors } = await this.processor.processBatch(files, (step) => {
      progress.push(step);
    });

    const sessionId = req.sessionId ?? this.store.createSession();
    this.store.replace(sessionId, report);
    res.setHeader(SESSION_HEADER, sessionId);

    res.status(200).json({
      success: true,
      message: "Processamento concluído! Confira os resultados abaixo.",
      ...this.describeReport(report),
      errors,
      progress,
      csv: this.csvGenerator.generateCSV(report.rows),
    });
  }

  getReport(req: Request, res: Response): void {
    const report = this.currentReport(req);
    res.status(200).json(this.describeReport(report));
  }

  downloadReport(req: Request, res: Response): void {
    const report = this.currentReport(req);

    if (report.rows.length === 0) {
      res.status(404).json({ error: "No report available. Process at least one file first." });
      return;
    }

    const xlsxBuffer = this.xlsxGenerator.generateXLSX(report.rows);

    res.setHeader("Content-Type", XLSX_MIME_TYPE);
    res.setHeader("Content-Disposition", `attachment; filename="${REPORT_FILE_NAME}"`);
    res.setHeader("Content-Length", xlsxBuffer.length.toString());
    res.status(200).send(xlsxBuffer);
  }

  resetReport(req: Request, res: Response): void {
    const report = req.sessionId ? this.store.reset(req.sessionId) : emptyReport();
    res.status(200).json(this.describeReport(report));
  }
}
