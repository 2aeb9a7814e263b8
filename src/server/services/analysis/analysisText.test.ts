import { describe, expect, it } from 'vitest';
import { extractScore, isScoreLine, splitAnalysisText } from './analysisText.js';

describe('extractScore', () => {
  it('reads a labelled score out of ten', () => {
    expect(extractScore('Bom currículo.\nNota: 8/10')).toBe(8);
  });

  it('reads labelled scores without the denominator', () => {
    expect(extractScore('Pontuação final: 9')).toBe(9);
    expect(extractScore('Score = 6')).toBe(6);
  });

  it('accepts a perfect score', () => {
    expect(extractScore('Avaliação geral: 10/10')).toBe(10);
  });

  it('falls back to a bare N/10', () => {
    expect(extractScore('No geral, eu daria 7/10 para este perfil.')).toBe(7);
  });

  it('returns undefined when no score is present', () => {
    expect(extractScore('Experiência de 5 anos em análise de dados.')).toBeUndefined();
  });

  it('does not truncate decimal scores', () => {
    expect(extractScore('nota 7.5')).toBeUndefined();
  });
});

describe('isScoreLine', () => {
  it('matches lines that only state the score', () => {
    expect(isScoreLine('Nota: 7/10')).toBe(true);
    expect(isScoreLine('8/10')).toBe(true);
  });

  it('does not match ordinary text', () => {
    expect(isScoreLine('Revise as datas de 2019 a 2021')).toBe(false);
  });

  it('does not match prose that opens with a score label', () => {
    expect(isScoreLine('Nota-se que faltam 2 datas nas experiências')).toBe(false);
    expect(isScoreLine('Score de 3 projetos sem link')).toBe(false);
  });

  it('matches a labelled score without the denominator', () => {
    expect(isScoreLine('Pontuação final: 9.')).toBe(true);
  });
});

describe('splitAnalysisText', () => {
  it('splits at the suggestions marker and drops the score line', () => {
    expect(splitAnalysisText('Pontos fortes:\n...\nSugestões:\n...\nNota: 7/10')).toEqual({
      analysis: 'Pontos fortes:\n...',
      suggestions: '...',
    });
  });

  it('keeps inline suggestion text and appends trailing paragraphs to the analysis', () => {
    const text = 'Resumo bom.\nSugestões: incluir métricas\n- revisar datas\n\nConclusão final.';

    expect(splitAnalysisText(text)).toEqual({
      analysis: 'Resumo bom.\n\nConclusão final.',
      suggestions: 'incluir métricas\n- revisar datas',
    });
  });

  it('skips blank lines between the marker and the first suggestion', () => {
    expect(splitAnalysisText('Análise.\nSUGESTÕES\n\n- a\n- b')).toEqual({
      analysis: 'Análise.',
      suggestions: '- a\n- b',
    });
  });

  it('keeps prose starting with "Nota" inside the suggestions', () => {
    const text = [
      'Pontos fortes: boa estrutura',
      '',
      'Sugestões:',
      '- Incluir métricas',
      'Nota-se que faltam 2 datas nas experiências',
      '- Revisar o resumo',
      '',
      'Nota: 7/10',
    ].join('\n');

    expect(splitAnalysisText(text)).toEqual({
      analysis: 'Pontos fortes: boa estrutura',
      suggestions: '- Incluir métricas\nNota-se que faltam 2 datas nas experiências\n- Revisar o resumo',
    });
    expect(extractScore(text)).toBe(7);
  });

  it('returns the whole text as analysis without a marker', () => {
    expect(splitAnalysisText('Texto corrido sem divisão.')).toEqual({
      analysis: 'Texto corrido sem divisão.',
      suggestions: '',
    });
  });
});
