import { RankingConfig } from "../config/ranking.js";
import { DocumentHandle, DocumentSource } from "../domain/documentSource.js";
import { DocumentOutline, DocumentRef, OutlineEntry, Section } from "../domain/types.js";
import { createComponentLogger } from "../infra/logging/logger.js";
import { collapseWhitespace, toCappedLines } from "../utils/text.js";

export type ExtractionOptions = Pick<
  RankingConfig,
  | "contentCharLimit"
  | "maxOutlineDepth"
  | "includeSubLevels"
  | "titleScanLines"
  | "minTitleLength"
  | "maxTitleLength"
  | "extractionConcurrency"
>;

export type ExtractedSection = Omit<Section, "ordinal">;

// Reading starts after the heading at `startLine` and stops before `endLine`.
export interface PageRange {
  startPage: number;
  endPage: number;
  startLine?: number;
  endLine?: number;
}

export interface SectionSpan extends PageRange {
  title: string;
  level: number;
}

const log = createComponentLogger("section-extractor");

/**
 * Turns outline entries into page spans.
 *
 * Entries deeper than `maxOutlineDepth` are dropped. Without
 * `includeSubLevels`, an entry deeper than the section currently open is
 * folded into that section, and each section runs until the next entry at
 * the same or a shallower level. With it, every entry is a section that ends
 * where the next entry begins. Entries that carry a heading line end at that
 * line instead of at the page before.
 */
export function planOutlineSpans(
  entries: readonly OutlineEntry[],
  pageCount: number,
  options: Pick<ExtractionOptions, "maxOutlineDepth" | "includeSubLevels">,
): SectionSpan[] {
  if (pageCount <= 0) {
    return [];
  }

  const kept = entries.filter(
    (entry) =>
      entry.level >= 1 && entry.level <= options.maxOutlineDepth && entry.text.trim() !== "",
  );

  let sectionEntries: OutlineEntry[];
  if (options.includeSubLevels) {
    sectionEntries = kept;
  } else {
    sectionEntries = [];
    let openLevel: number | null = null;
    for (const entry of kept) {
      if (openLevel !== null && entry.level > openLevel) {
        continue;
      }
      sectionEntries.push(entry);
      openLevel = entry.level;
    }
  }

  return sectionEntries.map((entry, index) => {
    const startPage = clampPage(entry.page, pageCount);
    const next = sectionEntries[index + 1];
    let end: Pick<PageRange, "endPage" | "endLine"> = { endPage: pageCount };
    if (next) {
      const nextPage = clampPage(next.page, pageCount);
      end =
        next.line !== undefined && nextPage >= startPage
          ? { endPage: nextPage, endLine: next.line }
          : { endPage: Math.max(startPage, nextPage - 1) };
    }

    return {
      title: collapseWhitespace(entry.text),
      level: entry.level,
      startPage,
      ...(entry.line === undefined ? {} : { startLine: entry.line }),
      ...end,
    };
  });
}

export function leadingRange(first: PageRange): PageRange | null {
  if (first.startLine !== undefined && first.startLine > 0) {
    return { startPage: 1, endPage: first.startPage, endLine: first.startLine };
  }
  if (first.startPage > 1) {
    return { startPage: 1, endPage: first.startPage - 1 };
  }
  return null;
}

export function synthesizePageTitle(
  pageText: string,
  pageNumber: number,
  options: Pick<ExtractionOptions, "titleScanLines" | "minTitleLength" | "maxTitleLength">,
): string {
  const candidates = pageText
    .split("\n")
    .map((line) => collapseWhitespace(line))
    .filter(Boolean)
    .slice(0, options.titleScanLines);

  const title = candidates.find(
    (line) => line.length > options.minTitleLength && line.length < options.maxTitleLength,
  );
  return title ?? `Page ${pageNumber}`;
}

export function placeholderSection(
  document: string,
  options: Pick<ExtractionOptions, "maxOutlineDepth">,
): ExtractedSection {
  return {
    document,
    pageNumber: 1,
    sectionTitle: `Unreadable document: ${document}`,
    level: options.maxOutlineDepth,
    content: "",
    lines: [],
  };
}

// Never throws: a document that cannot be read yields one placeholder section.
export async function extractSections(
  document: DocumentRef,
  source: DocumentSource,
  outline: DocumentOutline | null,
  options: ExtractionOptions,
): Promise<ExtractedSection[]> {
  let handle: DocumentHandle;
  try {
    handle = await source.open(document.path);
  } catch (error) {
    log.warn({ err: error, document: document.id }, "Document could not be opened, using placeholder");
    return [placeholderSection(document.id, options)];
  }

  try {
    if (handle.pageCount <= 0) {
      log.warn({ document: document.id }, "Document has no pages, using placeholder");
      return [placeholderSection(document.id, options)];
    }

    const entries = outline && outline.entries.length > 0
      ? outline.entries
      : await readEmbeddedOutline(handle, document.id);
    const pages = new PageReader(handle);

    const spans = planOutlineSpans(entries, handle.pageCount, options);
    if (spans.length > 0) {
      const sections: ExtractedSection[] = [];
      const lead = leadingRange(spans[0]);
      if (lead) {
        const text = await pages.readRange(lead, options.contentCharLimit);
        if (collapseWhitespace(text)) {
          const title = synthesizePageTitle(text, 1, options);
          sections.push(buildSection(document.id, 1, title, options.maxOutlineDepth, text, options));
        }
      }
      for (const span of spans) {
        const text = await pages.readRange(span, options.contentCharLimit);
        sections.push(buildSection(document.id, span.startPage, span.title, span.level, text, options));
      }
      return sections;
    }

    const sections: ExtractedSection[] = [];
    for (let pageNumber = 1; pageNumber <= handle.pageCount; pageNumber += 1) {
      const text = await pages.read(pageNumber);
      const title = synthesizePageTitle(text, pageNumber, options);
      sections.push(
        buildSection(document.id, pageNumber, title, options.maxOutlineDepth, text, options),
      );
    }
    return sections;
  } catch (error) {
    log.warn({ err: error, document: document.id }, "Text extraction failed, using placeholder");
    return [placeholderSection(document.id, options)];
  } finally {
    await handle.close().catch((error: unknown) => {
      log.warn({ err: error, document: document.id }, "Failed to close document");
    });
  }
}

// Results and ordinals follow request order, whatever order documents finish in.
export async function extractAllSections(
  documents: readonly DocumentRef[],
  source: DocumentSource,
  outlines: ReadonlyMap<string, DocumentOutline>,
  options: ExtractionOptions,
): Promise<Section[]> {
  if (documents.length === 0) {
    return [];
  }

  const perDocument: ExtractedSection[][] = new Array(documents.length);
  const workers = Math.min(Math.max(1, options.extractionConcurrency), documents.length);
  let cursor = 0;

  const runWorker = async () => {
    while (true) {
      const index = cursor;
      cursor += 1;
      if (index >= documents.length) {
        return;
      }
      const document = documents[index];
      perDocument[index] = await extractSections(
        document,
        source,
        outlines.get(document.id) ?? null,
        options,
      );
    }
  };

  await Promise.all(Array.from({ length: workers }, () => runWorker()));

  return perDocument.flat().map((section, ordinal) => ({ ...section, ordinal }));
}

async function readEmbeddedOutline(
  handle: DocumentHandle,
  documentId: string,
): Promise<OutlineEntry[]> {
  try {
    const toc = await handle.tableOfContents();
    return toc.map((entry) => ({
      text: entry.title,
      page: entry.page,
      level: entry.level,
      line: entry.line,
    }));
  } catch (error) {
    log.debug({ err: error, document: documentId }, "No readable table of contents");
    return [];
  }
}

function buildSection(
  document: string,
  pageNumber: number,
  title: string,
  level: number,
  text: string,
  options: Pick<ExtractionOptions, "contentCharLimit">,
): ExtractedSection {
  const lines = toCappedLines(text, options.contentCharLimit);
  return {
    document,
    pageNumber,
    sectionTitle: title,
    level,
    content: lines.join(" "),
    lines,
  };
}

function clampPage(page: number, pageCount: number): number {
  if (!Number.isFinite(page)) {
    return 1;
  }
  return Math.min(Math.max(1, Math.trunc(page)), pageCount);
}

class PageReader {
  private readonly cache = new Map<number, string>();

  constructor(private readonly handle: DocumentHandle) {}

  async read(pageNumber: number): Promise<string> {
    const cached = this.cache.get(pageNumber);
    if (cached !== undefined) {
      return cached;
    }
    const text = await this.handle.pageText(pageNumber - 1);
    this.cache.set(pageNumber, text);
    return text;
  }

  // Stops once the collected text already fills the section cap.
  async readRange(range: PageRange, charLimit: number): Promise<string> {
    const parts: string[] = [];
    let collected = 0;
    for (let pageNumber = range.startPage; pageNumber <= range.endPage; pageNumber += 1) {
      const text = sliceLines(await this.read(pageNumber), pageNumber, range);
      parts.push(text);
      collected += collapseWhitespace(text).length + 1;
      if (collected >= charLimit) {
        break;
      }
    }
    return parts.join("\n");
  }
}

function sliceLines(text: string, pageNumber: number, range: PageRange): string {
  const from =
    pageNumber === range.startPage && range.startLine !== undefined ? range.startLine + 1 : 0;
  const to = pageNumber === range.endPage ? range.endLine : undefined;
  if (from === 0 && to === undefined) {
    return text;
  }
  return text.split("\n").slice(from, to).join("\n");
}
