import path from "node:path";
import { DocumentHandle, DocumentSource } from "../../domain/documentSource.js";
import { DocumentExtractionError } from "../../domain/errors.js";
import { PdfDocumentSource } from "./pdfDocumentSource.js";
import { TextDocumentSource } from "./textDocumentSource.js";

const SUPPORTED_EXTENSIONS = new Set([".pdf", ".txt", ".md"]);

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export class ExtensionDocumentSource implements DocumentSource {
  constructor(
    private readonly pdf: DocumentSource = new PdfDocumentSource(),
    private readonly text: DocumentSource = new TextDocumentSource(),
  ) {}

  async open(filePath: string): Promise<DocumentHandle> {
    const ext = path.extname(filePath).toLowerCase();

    if (ext === ".pdf") {
      return this.pdf.open(filePath);
    }

    if (ext === ".md" || ext === ".txt") {
      return this.text.open(filePath);
    }

    throw new DocumentExtractionError(
      `Unsupported extension: ${ext}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
      filePath,
    );
  }
}

export function createDocumentSource(): DocumentSource {
  return new ExtensionDocumentSource();
}
