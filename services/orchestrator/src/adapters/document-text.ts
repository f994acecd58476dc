import { readFile } from "node:fs/promises";
import path from "node:path";

import mammoth from "mammoth";
import { getDocumentProxy } from "unpdf";

async function readPdf(filePath: string): Promise<string> {
  const buffer = await readFile(filePath);
  const pdf = await getDocumentProxy(new Uint8Array(buffer));

  const pages: string[] = [];
  for (let i = 1; i <= pdf.numPages; i++) {
    const page = await pdf.getPage(i);
    const textContent = await page.getTextContent();
    const text = textContent.items
      .map((item) => ("str" in item ? item.str : ""))
      .join(" ");
    pages.push(text);
  }
  return pages.join("\n");
}

async function readDocx(filePath: string): Promise<string> {
  const result = await mammoth.extractRawText({ path: filePath });
  return result.value
    .split(/\n+/)
    .filter((paragraph) => paragraph.length > 0)
    .join("\n");
}

export async function extractDocumentText(filePath: string): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case ".txt":
      return readFile(filePath, "utf-8");
    case ".pdf":
      return readPdf(filePath);
    case ".docx":
      return readDocx(filePath);
    default:
      throw new Error(`No text extractor for ${ext || "files without an extension"}`);
  }
}

/** Frames one file's text so the model can tell files apart. */
export function wrapDocumentText(displayName: string, content: string): string {
  return `\n--- START OF FILE: ${displayName} ---\n${content}\n--- END OF FILE: ${displayName} ---\n`;
}
