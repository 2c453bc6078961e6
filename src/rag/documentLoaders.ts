import * as fs from 'fs/promises';
import * as path from 'path';
import mammoth from 'mammoth';

/**
 * Reads a document and returns its plain text
 */
export type DocumentLoader = (filePath: string) => Promise<string>;

const readText: DocumentLoader = filePath => fs.readFile(filePath, 'utf-8');

const readPdf: DocumentLoader = async filePath => {
  // loaded on first use
  const { default: pdfParse } = await import('pdf-parse');
  const result = await pdfParse(await fs.readFile(filePath));
  return result.text;
};

const readDocx: DocumentLoader = async filePath => {
  const result = await mammoth.extractRawText({ path: filePath });
  return result.value;
};

export const DOCUMENT_LOADERS: Record<string, DocumentLoader> = {
  '.txt': readText,
  '.md': readText,
  '.pdf': readPdf,
  '.docx': readDocx
};

export function isSupportedDocument(fileName: string): boolean {
  return Object.hasOwn(DOCUMENT_LOADERS, path.extname(fileName).toLowerCase());
}

export async function loadDocumentText(filePath: string): Promise<string> {
  const extension = path.extname(filePath).toLowerCase();
  if (!Object.hasOwn(DOCUMENT_LOADERS, extension)) {
    throw new Error(`Unsupported document type: ${path.basename(filePath)}`);
  }
  return DOCUMENT_LOADERS[extension](filePath);
}
