import { createRequire } from "module";
import type PdfParse from "pdf-parse";
import { PageReader } from "../types/index.js";

interface TextItem {
  str: string;
  width: number;
  transform: number[];
}

interface PdfPageData {
  getTextContent(options: {
    normalizeWhitespace: boolean;
    disableCombineTextItems: boolean;
  }): Promise<{ items: TextItem[] }>;
}

type PdfParseFn = (
  dataBuffer: Buffer,
  options?: { pagerender?: (pageData: PdfPageData) => Promise<string> }
) => Promise<PdfParse.Result>;

// Loaded through require so pdf-parse sees a parent module and skips its debug self-test
const require = createRequire(import.meta.url);
const pdfParse: PdfParseFn = require("pdf-parse");

// Horizontal gap, in page units, above which two items on a line are separate words
const WORD_GAP = 1;

/**
 * Reads the text of every page, in page order.
 * Lines are split wherever the vertical position of a text item changes,
 * which is how pdf-parse renders pages by default. Items on the same line
 * with a gap between them (statement columns) are joined with a space.
 */
async function renderPage(pageData: PdfPageData): Promise<string> {
  const content = await pageData.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });

  let lastY: number | undefined;
  let lastEndX = 0;
  let text = "";
  for (const item of content.items) {
    const x = item.transform[4];
    const y = item.transform[5];
    if (lastY === undefined) {
      text += item.str;
    } else if (lastY !== y) {
      text += "\n" + item.str;
    } else if (x > lastEndX + WORD_GAP) {
      text += " " + item.str;
    } else {
      text += item.str;
    }
    lastY = y;
    lastEndX = x + item.width;
  }
  return text;
}

// pdf.js reads the whole ArrayBuffer behind a Buffer and ignores its byteOffset,
// so slices of Node's shared pool must be copied into memory of their own
function ownedCopy(buffer: Buffer): Buffer {
  const bytes = new Uint8Array(buffer);
  return Buffer.from(bytes.buffer);
}

export class PDFParser implements PageReader {
  async readPages(buffer: Buffer): Promise<string[]> {
    const pages: string[] = [];

    try {
      const data = await pdfParse(ownedCopy(buffer), {
        pagerender: async (pageData) => {
          const text = await renderPage(pageData);
          pages.push(text);
          return text;
        },
      });

      console.log("PDF Number of pages:", data.numpages);
      console.log("PDF Text length:", data.text.length);
    } catch (error) {
      console.error("Error parsing PDF:", error);
      throw new Error(
        `Failed to parse PDF file: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return pages;
  }
}

export const pdfParser = new PDFParser();
