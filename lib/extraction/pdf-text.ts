/**
 * Document text loading.
 *
 * PDFs go through pdf-parse (v2 class API) and come back one string per
 * page. Anything else is read as UTF-8 text with form feeds as page breaks,
 * which is what `pdftotext` writes.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";

export interface DocumentText {
  pages: string[];
  fileType: "pdf" | "text";
}

export async function extractPagesFromPdf(buffer: Buffer): Promise<string[]> {
  const parser = new PDFParse({ data: new Uint8Array(buffer) });
  try {
    const result = await parser.getText();
    return result.pages.map((page) => page.text);
  } finally {
    await parser.destroy();
  }
}

export function splitTextPages(text: string): string[] {
  return text.split("\f");
}

/**
 * Load a document's text, one entry per page.
 * Throws (ENOENT etc.) when the file cannot be read.
 */
export async function loadDocumentText(filePath: string): Promise<DocumentText> {
  const buffer = await fs.readFile(filePath);

  if (path.extname(filePath).toLowerCase() === ".pdf") {
    return { pages: await extractPagesFromPdf(buffer), fileType: "pdf" };
  }
  return { pages: splitTextPages(buffer.toString("utf-8")), fileType: "text" };
}
