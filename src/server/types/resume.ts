/**
 * Resume pipeline data model
 */

export type DocumentKind = 'pdf' | 'text';

/**
 * A single upload, alive for one request
 */
export interface UploadedDocument {
  buffer: Buffer;
  kind: DocumentKind;
  byteLength: number;
  filename?: string;
}

/**
 * Body sent to the analysis webhook
 */
export interface AnalysisRequest {
  resume_text: string;
  adjust: boolean;
}

/**
 * Canonical result, whichever response shape the webhook used.
 * Absent text fields are empty strings; an absent score is undefined, never 0.
 */
export interface AnalysisResult {
  analysisText: string;
  suggestionsText: string;
  score?: number;
  rewrittenText: string;
}

/**
 * JSON record returned to callers in analysis mode
 */
export interface AnalysisReport {
  analysis: string;
  suggestions: string;
  score: number | null;
}

export type PipelineOutcome =
  | { kind: 'analysis'; report: AnalysisReport }
  | { kind: 'pdf'; pdf: Buffer; filename: string };

// ── Layout ──────────────────────────────────────────────────

export interface ContactHeader {
  name: string;
  contactLines: string[];
}

export interface HeadingBlock {
  kind: 'heading';
  title: string;
}

export interface BulletBlock {
  kind: 'bullet';
  text: string;
}

export interface ParagraphBlock {
  kind: 'paragraph';
  text: string;
  /** `role` lines ("Analyst | Company") render bold */
  emphasis: 'body' | 'role';
}

export interface TwoColumnListBlock {
  kind: 'two-column';
  left: string[];
  right: string[];
}

export type ResumeBlock = HeadingBlock | BulletBlock | ParagraphBlock | TwoColumnListBlock;

export interface RenderedDocument {
  header?: ContactHeader;
  blocks: ResumeBlock[];
}
