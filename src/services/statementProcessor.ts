import {
  BatchOutcome,
  FileError,
  PageReader,
  ProcessingProgress,
  ReportRow,
  UploadedStatement,
} from "../types/index.js";
import { BalanceExtractor } from "./balanceExtractor.js";
import { ReportBuilder } from "./reportBuilder.js";

export type ProgressListener = (progress: ProcessingProgress) => void;

export class StatementProcessor {
  constructor(
    private readonly reader: PageReader,
    private readonly extractor: BalanceExtractor = new BalanceExtractor(),
    private readonly builder: ReportBuilder = new ReportBuilder()
  ) {}

  /**
   * Processes the statements one at a time, in upload order.
   * Each file is isolated: a read failure becomes its own sentinel row
   * and the remaining files are still processed.
   */
  async processBatch(
    files: UploadedStatement[],
    onProgress?: ProgressListener
  ): Promise<BatchOutcome> {
    const rows: ReportRow[] = [];
    const errors: FileError[] = [];
    const total = files.length;

    for (const [index, file] of files.entries()) {
      console.log(`Processando: ${file.name} (${index + 1}/${total})...`);

      const result = await this.extractor.readAndExtract(this.reader, file.buffer);

      if (result.status === "read_error") {
        const message = `Erro ao processar o arquivo ${file.name}: ${result.message}`;
        console.error(message);
        errors.push({ file: file.name, message });
      } else if (result.records.length === 0) {
        console.warn(`⚠️  Saldo não encontrado em ${file.name}`);
      } else {
        console.log(`✅ ${result.records.length} saldo(s) encontrado(s) em ${file.name}`);
      }

      rows.push(...this.builder.buildRows(file.name, result));

      onProgress?.({
        file: file.name,
        index,
        processed: index + 1,
        total,
        fraction: (index + 1) / total,
      });
    }

    return {
      report: { rows, generatedAt: new Date() },
      errors,
    };
  }
}
