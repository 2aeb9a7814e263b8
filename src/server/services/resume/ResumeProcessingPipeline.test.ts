import { describe, expect, it, vi } from 'vitest';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import {
  ADJUSTED_RESUME_FILENAME,
  ResumeProcessingPipeline,
  candidateNameFrom,
} from './ResumeProcessingPipeline.js';
import type { ResumeRenderer, TextExtractor } from './ResumeProcessingPipeline.js';
import { AnalysisWebhookClient } from '../../clients/AnalysisWebhookClient.js';
import type { AnalysisClient } from '../../clients/AnalysisWebhookClient.js';
import { createHttpClient } from '../../config/httpClient.js';
import { ResumeTextExtractor } from '../../extraction/ResumeTextExtractor.js';
import { MissingRewriteError, PayloadTooLargeError } from '../../types/errors.js';
import type { AnalysisResult, UploadedDocument } from '../../types/resume.js';

const RESUME_TEXT = 'João Silva\njoao@x.com\n\nEXPERIÊNCIA\n- Built X\n- Built Y';

function textUpload(text: string): UploadedDocument {
  const buffer = Buffer.from(text, 'utf-8');
  return { buffer, kind: 'text', byteLength: buffer.length };
}

function stubClient(result: Partial<AnalysisResult>) {
  const analyze = vi.fn<AnalysisClient['analyze']>(async () => ({
    analysisText: '',
    suggestionsText: '',
    rewrittenText: '',
    ...result,
  }));
  return { analyze };
}

function stubRenderer() {
  const render = vi.fn<ResumeRenderer['render']>(async () => Buffer.from('%PDF-1.7 test'));
  return { render };
}

function stubExtractor() {
  const extract = vi.fn<TextExtractor['extract']>(async () => RESUME_TEXT);
  return { extract };
}

describe('ResumeProcessingPipeline', () => {
  it('rejects an oversized upload before extraction or any network call', async () => {
    const extractor = stubExtractor();
    const client = stubClient({});
    const pipeline = new ResumeProcessingPipeline(16, extractor, client, stubRenderer());
    const upload = textUpload('x'.repeat(17));

    await expect(pipeline.process(upload, false)).rejects.toBeInstanceOf(PayloadTooLargeError);
    expect(extractor.extract).not.toHaveBeenCalled();
    expect(client.analyze).toHaveBeenCalledTimes(0);
  });

  it('accepts an upload of exactly the maximum size', async () => {
    const upload = textUpload('x'.repeat(16));
    const pipeline = new ResumeProcessingPipeline(16, stubExtractor(), stubClient({}), stubRenderer());

    await expect(pipeline.process(upload, false)).resolves.toMatchObject({ kind: 'analysis' });
  });

  it('returns the analysis report for a plain-text resume', async () => {
    let sentBody: unknown;
    const http = createHttpClient({
      adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
        sentBody = JSON.parse(String(config.data));
        return {
          data: [{ output: 'Pontos fortes:\n...\nSugestões:\n...\nNota: 7/10' }],
          status: 200,
          statusText: 'OK',
          headers: {},
          config,
        };
      },
    });
    const client = new AnalysisWebhookClient({ webhookUrl: 'http://analysis.test/hook', timeoutMs: 1000 }, http);
    const pipeline = new ResumeProcessingPipeline(1024, new ResumeTextExtractor(), client, stubRenderer());

    const outcome = await pipeline.process(textUpload(RESUME_TEXT), false);

    expect(sentBody).toEqual({ resume_text: RESUME_TEXT, adjust: false });
    expect(outcome).toEqual({
      kind: 'analysis',
      report: { analysis: 'Pontos fortes:\n...', suggestions: '...', score: 7 },
    });
  });

  it('reports a missing score as null', async () => {
    const pipeline = new ResumeProcessingPipeline(
      1024,
      stubExtractor(),
      stubClient({ analysisText: 'Boa estrutura.' }),
      stubRenderer()
    );

    await expect(pipeline.process(textUpload(RESUME_TEXT), false)).resolves.toEqual({
      kind: 'analysis',
      report: { analysis: 'Boa estrutura.', suggestions: '', score: null },
    });
  });

  it('renders the rewritten resume in adjust mode', async () => {
    const renderer = stubRenderer();
    const client = stubClient({ rewrittenText: 'JOÃO SILVA\n\nEXPERIÊNCIA\n- Built X' });
    const pipeline = new ResumeProcessingPipeline(1024, stubExtractor(), client, renderer);

    const outcome = await pipeline.process(textUpload(RESUME_TEXT), true);

    expect(client.analyze).toHaveBeenCalledWith(RESUME_TEXT, true);
    expect(renderer.render).toHaveBeenCalledWith('JOÃO SILVA\n\nEXPERIÊNCIA\n- Built X', {
      candidateName: 'João Silva',
    });
    expect(outcome).toEqual({
      kind: 'pdf',
      pdf: Buffer.from('%PDF-1.7 test'),
      filename: ADJUSTED_RESUME_FILENAME,
    });
  });

  it('fails when adjust mode returns no rewritten text', async () => {
    const renderer = stubRenderer();
    const pipeline = new ResumeProcessingPipeline(1024, stubExtractor(), stubClient({ rewrittenText: '  \n' }), renderer);

    await expect(pipeline.process(textUpload(RESUME_TEXT), true)).rejects.toBeInstanceOf(MissingRewriteError);
    expect(renderer.render).not.toHaveBeenCalled();
  });
});

describe('candidateNameFrom', () => {
  it('uses a short first line', () => {
    expect(candidateNameFrom('Maria Souza\nmaria@x.com')).toBe('Maria Souza');
  });

  it('ignores a first line that is too long to be a name', () => {
    expect(candidateNameFrom(`${'Profissional experiente '.repeat(4)}\nresto`)).toBeUndefined();
  });
});
