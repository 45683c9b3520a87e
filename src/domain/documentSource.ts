export interface TocEntry {
  level: number;
  title: string;
  page: number;
  line?: number;
}

export interface DocumentHandle {
  readonly pageCount: number;
  pageText(index: number): Promise<string>;
  tableOfContents(): Promise<TocEntry[]>;
  close(): Promise<void>;
}

export interface DocumentSource {
  open(filePath: string): Promise<DocumentHandle>;
}
