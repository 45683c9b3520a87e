export interface DocumentRef {
  id: string;
  path: string;
}

export interface OutlineEntry {
  text: string;
  page: number;
  level: number;
  // Zero-based heading line within the page, where the source knows it.
  line?: number;
}

export interface DocumentOutline {
  title: string | null;
  entries: OutlineEntry[];
}

export interface Section {
  readonly document: string;
  readonly pageNumber: number;
  readonly sectionTitle: string;
  readonly level: number;
  readonly content: string;
  readonly lines: readonly string[];
  readonly ordinal: number;
}

export interface ScoredSection extends Section {
  readonly relevanceScore: number;
  readonly keywordScore: number;
  readonly modelAnalysis?: string;
}

export interface Subsection {
  readonly document: string;
  readonly pageNumber: number;
  readonly refinedText: string;
  readonly importanceRank: number;
}

export interface PersonaJob {
  persona: string;
  job: string;
}

export interface RunMetadata {
  input_documents: string[];
  persona: string;
  job_to_be_done: string;
  processing_timestamp: string | number;
  total_sections_analyzed?: number;
  processing_time_seconds?: number;
}

export interface ExtractedSectionRecord {
  document: string;
  section_title: string;
  page_number: number;
  importance_rank: number;
}

export interface SubsectionRecord {
  document: string;
  page_number: number;
  refined_text: string;
}

export interface RunResult {
  metadata: RunMetadata;
  extracted_sections: ExtractedSectionRecord[];
  subsection_analysis: SubsectionRecord[];
}
