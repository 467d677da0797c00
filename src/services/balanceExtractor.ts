import { BalanceRecord, ExtractionResult, PageReader } from "../types/index.js";

/**
 * Daily balance line:
 *   DATE  DOC-NUMBER  SALDO DIA  MOVEMENT [C|D]  BALANCE [C|D]
 *
 * Group 1 is the date (DD/MM/YY or DD/MM/YYYY), group 2 the closing balance.
 * Amounts use "." for thousands and "," for decimals.
 */
export const DAILY_BALANCE_PATTERN =
  /(\d{2}\/\d{2}\/\d{2,4})\s+\d+\s+SALDO DIA\s+[\d.]+,\d{2}(?:\s+[CD])?\s+([\d.]+,\d{2})(?:\s+[CD])?/gi;

export function cleanBalance(raw: string): string {
  return raw.trim().replace(/\./g, "");
}

export function joinPages(pages: string[]): string {
  return pages
    .filter((page) => page.length > 0)
    .map((page) => page + "\n")
    .join("");
}

export class BalanceExtractor {
  extract(documentText: string): ExtractionResult {
    const records: BalanceRecord[] = [];

    // matchAll works on a copy of the regex, so lastIndex never leaks between calls
    for (const match of documentText.matchAll(DAILY_BALANCE_PATTERN)) {
      const [, date, rawBalance] = match;
      records.push({ date, balance: cleanBalance(rawBalance) });
    }

    return { status: "found", records };
  }

  extractFromPages(pages: string[]): ExtractionResult {
    return this.extract(joinPages(pages));
  }

  /**
   * Reads the document and scans it. A read failure short-circuits
   * into the read_error variant; nothing is thrown.
   */
  async readAndExtract(reader: PageReader, buffer: Buffer): Promise<ExtractionResult> {
    let pages: string[];
    try {
      pages = await reader.readPages(buffer);
    } catch (error) {
      return {
        status: "read_error",
        message: error instanceof Error ? error.message : String(error),
      };
    }

    return this.extractFromPages(pages);
  }
}
