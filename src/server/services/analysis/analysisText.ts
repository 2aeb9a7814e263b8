/**
 * Heuristics over the free-form analysis text returned by the webhook:
 * splitting off the suggestions block and finding the embedded score.
 *
 * These are policies tuned against the service's usual formatting
 * ("Pontos fortes: ... Sugestões: ... Nota: 7/10"), not a contract.
 */

const SUGGESTIONS_MARKER = /sugest/i;

const SCORE_LABEL = String.raw`(?:nota|score|pontua[cç][aã]o|avalia[cç][aã]o\s+geral)`;

/** "Nota: 8", "Score = 7/10", "Pontuação final - 9" */
const LABELLED_SCORE = new RegExp(
  String.raw`\b${SCORE_LABEL}(?:\s+final)?\s*[:=-]?\s*(10|\d)(?:\s*\/\s*10)?(?![\d.,]?\d)`,
  'i'
);

/** "8/10" anywhere in the text */
const OUT_OF_TEN_SCORE = /(?<![\d.,])(10|\d)\s*\/\s*10(?!\d)/;

/** A line that only states the score: "Nota: 7/10", "Score = 8", "9/10" */
const SCORE_LINE = new RegExp(
  String.raw`^\s*(?:${SCORE_LABEL}\b(?:\s+final)?\s*[:=-]?\s*(?:10|\d)(?:\s*\/\s*10)?|(?:10|\d)\s*\/\s*10)\s*\.?\s*$`,
  'i'
);

export interface SplitAnalysis {
  analysis: string;
  suggestions: string;
}

export function isScoreLine(line: string): boolean {
  return SCORE_LINE.test(line);
}

/**
 * Find a 0-10 score in the text. Returns undefined when there is none: a missing
 * score is never reported as 0.
 */
export function extractScore(text: string): number | undefined {
  const match = LABELLED_SCORE.exec(text) ?? OUT_OF_TEN_SCORE.exec(text);
  if (!match) {
    return undefined;
  }
  const score = parseInt(match[1], 10);
  return score >= 0 && score <= 10 ? score : undefined;
}

/**
 * Split combined analysis text at the first line mentioning suggestions.
 *
 * - lines before the marker line are the analysis
 * - the marker line's inline content (after ":") and the lines that follow, up to
 *   the next blank line or score line, are the suggestions
 * - anything after that boundary, score lines excepted, is appended to the analysis
 *
 * Without a marker the whole text is the analysis.
 */
export function splitAnalysisText(text: string): SplitAnalysis {
  const lines = text.split(/\r?\n/);
  const markerIndex = lines.findIndex((line) => SUGGESTIONS_MARKER.test(line));

  if (markerIndex === -1) {
    return { analysis: text, suggestions: '' };
  }

  const markerLine = lines[markerIndex];
  const colon = markerLine.indexOf(':');
  const inline = colon >= 0 ? markerLine.slice(colon + 1).trim() : '';

  const suggestionLines: string[] = inline ? [inline] : [];
  let index = markerIndex + 1;
  for (; index < lines.length; index++) {
    const line = lines[index];
    if (line.trim() === '') {
      // Blank lines between the marker heading and its first item are skipped
      if (suggestionLines.length === 0) continue;
      break;
    }
    if (isScoreLine(line)) {
      break;
    }
    suggestionLines.push(line);
  }

  const leading = lines.slice(0, markerIndex).join('\n').trim();
  const trailing = lines
    .slice(index)
    .filter((line) => !isScoreLine(line))
    .join('\n')
    .trim();

  return {
    analysis: [leading, trailing].filter((part) => part.length > 0).join('\n\n'),
    suggestions: suggestionLines.join('\n').trim(),
  };
}
