import { describe, expect, it } from 'vitest';
import { normalizeAnalysisResponse, unwrapEnvelope } from './AnalysisResponseNormalizer.js';
import { EmptyResponseError, MalformedResponseError } from '../../types/errors.js';

describe('normalizeAnalysisResponse', () => {
  describe('output shape', () => {
    it('splits an array-wrapped output into analysis, suggestions and score', () => {
      const raw = [{ output: 'Pontos fortes:\n...\nSugestões:\n...\nNota: 7/10' }];

      expect(normalizeAnalysisResponse(raw, false)).toEqual({
        analysisText: 'Pontos fortes:\n...',
        suggestionsText: '...',
        score: 7,
        rewrittenText: '',
      });
    });

    it('keeps suggestion lines that start with "Nota" in the suggestions', () => {
      const raw = [
        {
          output:
            'Pontos fortes: boa estrutura\n\nSugestões:\n- Incluir métricas\n' +
            'Nota-se que faltam 2 datas nas experiências\n- Revisar o resumo\n\nNota: 7/10',
        },
      ];

      expect(normalizeAnalysisResponse(raw, false)).toEqual({
        analysisText: 'Pontos fortes: boa estrutura',
        suggestionsText:
          '- Incluir métricas\nNota-se que faltam 2 datas nas experiências\n- Revisar o resumo',
        score: 7,
        rewrittenText: '',
      });
    });

    it('uses only the first element of an array', () => {
      const raw = [{ output: 'Primeiro' }, { output: 'Segundo' }];

      expect(normalizeAnalysisResponse(raw, false).analysisText).toBe('Primeiro');
    });

    it('treats the output as the rewritten resume in adjust mode', () => {
      const output = 'JOÃO SILVA\njoao@x.com\n\nEXPERIÊNCIA\n- Built X';

      const result = normalizeAnalysisResponse({ output }, true);

      expect(result.rewrittenText).toBe(output);
      expect(result.analysisText).toBe('');
      expect(result.suggestionsText).toBe('');
      expect(result.score).toBeUndefined();
    });

    it('uses the suggestions as analysis when nothing precedes the marker', () => {
      const result = normalizeAnalysisResponse({ output: 'Sugestões: revisar o resumo' }, false);

      expect(result.analysisText).toBe('revisar o resumo');
      expect(result.suggestionsText).toBe('revisar o resumo');
    });

    it('prefers an explicit score field', () => {
      expect(normalizeAnalysisResponse({ output: 'Nota: 4/10', score: '9' }, false).score).toBe(9);
    });

    it('ignores an out-of-range score field', () => {
      expect(normalizeAnalysisResponse({ output: 'Sem nota', score: 11 }, false).score).toBeUndefined();
    });
  });

  describe('rewritten_resume shape', () => {
    it('reads rewritten text, analysis and suggestions', () => {
      const raw = {
        rewritten_resume: 'MARIA SOUZA',
        analysis: 'Bom currículo. Nota: 8/10',
        suggestions: 'Adicionar métricas',
      };

      expect(normalizeAnalysisResponse(raw, true)).toEqual({
        analysisText: 'Bom currículo. Nota: 8/10',
        suggestionsText: 'Adicionar métricas',
        score: 8,
        rewrittenText: 'MARIA SOUZA',
      });
    });

    it('defaults missing analysis fields to empty strings', () => {
      const result = normalizeAnalysisResponse({ rewritten_resume: 'MARIA SOUZA' }, true);

      expect(result).toEqual({
        analysisText: '',
        suggestionsText: '',
        rewrittenText: 'MARIA SOUZA',
      });
      expect(result.score).toBeUndefined();
    });
  });

  it('rejects an empty array', () => {
    expect(() => normalizeAnalysisResponse([], false)).toThrow(EmptyResponseError);
  });

  it('rejects an object with none of the known fields', () => {
    try {
      normalizeAnalysisResponse({ analysis: 'Sem texto reescrito' }, true);
      expect.unreachable('normalizeAnalysisResponse should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedResponseError);
      expect(error).toMatchObject({
        statusCode: 500,
        context: { receivedFields: ['analysis'] },
      });
    }
  });

  it('rejects an output field that is not text', () => {
    expect(() => normalizeAnalysisResponse({ output: 5 }, false)).toThrow(MalformedResponseError);
  });
});

describe('unwrapEnvelope', () => {
  it('rejects a scalar body', () => {
    expect(() => unwrapEnvelope('oops')).toThrow('Analysis service returned string instead of JSON object');
  });

  it('rejects an array of non-objects', () => {
    expect(() => unwrapEnvelope([42])).toThrow(
      'Analysis service returned an array whose first element is number'
    );
  });

  it('rejects null', () => {
    expect(() => unwrapEnvelope(null)).toThrow(MalformedResponseError);
  });
});
