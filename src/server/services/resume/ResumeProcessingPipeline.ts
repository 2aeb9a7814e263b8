/**
 * ResumeProcessingPipeline
 *
 * size check → extract text → analysis webhook → analysis report or rendered PDF
 *
 * Every step is single-shot; errors from the extractor, the client and the renderer
 * propagate unchanged so the HTTP layer can map them.
 */

import { AnalysisWebhookClient } from '../../clients/AnalysisWebhookClient.js';
import type { AnalysisClient } from '../../clients/AnalysisWebhookClient.js';
import type { PipelineConfig } from '../../config/pipelineConfig.js';
import { ResumeTextExtractor } from '../../extraction/ResumeTextExtractor.js';
import { MissingRewriteError, PayloadTooLargeError } from '../../types/errors.js';
import type {
  AnalysisReport,
  AnalysisResult,
  PipelineOutcome,
  UploadedDocument,
} from '../../types/resume.js';
import { logger } from '../../utils/logger.js';
import { ResumePdfRenderer } from './ResumePdfRenderer.js';

export const ADJUSTED_RESUME_FILENAME = 'curriculo_ajustado.pdf';

const MAX_NAME_LENGTH = 60;

export interface ResumeRenderer {
  render(rewrittenText: string, options?: { candidateName?: string }): Promise<Buffer>;
}

export interface TextExtractor {
  extract(buffer: Buffer, kind: UploadedDocument['kind']): Promise<string>;
}

/**
 * First line of the extracted text, when it is short enough to be a name
 */
export function candidateNameFrom(text: string): string | undefined {
  const firstLine = text.split(/\r?\n/, 1)[0].trim();
  return firstLine.length > 0 && firstLine.length < MAX_NAME_LENGTH ? firstLine : undefined;
}

export class ResumeProcessingPipeline {
  constructor(
    private readonly maxUploadBytes: number,
    private readonly extractor: TextExtractor,
    private readonly analysisClient: AnalysisClient,
    private readonly renderer: ResumeRenderer
  ) {}

  /**
   * @throws PayloadTooLargeError before any extraction or network work
   * @throws MissingRewriteError in adjust mode when no rewritten text came back
   */
  async process(document: UploadedDocument, adjust: boolean): Promise<PipelineOutcome> {
    if (document.byteLength > this.maxUploadBytes) {
      throw new PayloadTooLargeError(document.byteLength, this.maxUploadBytes);
    }

    const text = await this.extractor.extract(document.buffer, document.kind);
    const result = await this.analysisClient.analyze(text, adjust);

    if (!adjust) {
      logger.info({ score: result.score ?? null }, 'Resume analysis completed');
      return { kind: 'analysis', report: toReport(result) };
    }

    if (!result.rewrittenText.trim()) {
      throw new MissingRewriteError(undefined, { filename: document.filename });
    }

    const pdf = await this.renderer.render(result.rewrittenText, {
      candidateName: candidateNameFrom(text),
    });
    return { kind: 'pdf', pdf, filename: ADJUSTED_RESUME_FILENAME };
  }
}

function toReport(result: AnalysisResult): AnalysisReport {
  return {
    analysis: result.analysisText,
    suggestions: result.suggestionsText,
    score: result.score ?? null,
  };
}

export function createResumeProcessingPipeline(config: PipelineConfig): ResumeProcessingPipeline {
  return new ResumeProcessingPipeline(
    config.maxUploadBytes,
    new ResumeTextExtractor(),
    new AnalysisWebhookClient(config.analysis),
    new ResumePdfRenderer(config.layout)
  );
}
