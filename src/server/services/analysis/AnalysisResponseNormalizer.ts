/**
 * AnalysisResponseNormalizer
 *
 * The analysis webhook answers in several shapes:
 *   - Array:  [{ "output": "..." }]                       → first element is used
 *   - Object: { "output": "..." }
 *   - Object: { "rewritten_resume": "...", "analysis": "..." }
 *   - Object: { "rewritten_resume": "..." }
 *
 * The envelope is unwrapped first, then an ordered list of matchers is tried
 * against the working object. The first matcher that accepts the object wins.
 */

import { z } from 'zod';
import { EmptyResponseError, MalformedResponseError } from '../../types/errors.js';
import type { AnalysisResult } from '../../types/resume.js';
import { extractScore, splitAnalysisText } from './analysisText.js';

export type WorkingObject = Record<string, unknown>;

/** Non-string values for optional text fields are treated as absent */
const optionalText = z.string().catch('');

/** Explicit score field: an integer 0-10, as a number or a numeric string */
const explicitScore = z
  .union([z.number(), z.string().regex(/^\s*\d{1,2}\s*$/).transform(Number)])
  .pipe(z.number().int().min(0).max(10))
  .optional()
  .catch(undefined);

const outputShape = z.object({
  output: z.string(),
  score: explicitScore,
});

const rewriteShape = z.object({
  rewritten_resume: z.string(),
  analysis: optionalText,
  suggestions: optionalText,
  score: explicitScore,
});

export interface ResponseMatcher {
  readonly name: string;
  /** Returns undefined when the object does not have this matcher's shape */
  normalize(data: WorkingObject, adjust: boolean): AnalysisResult | undefined;
}

export const outputMatcher: ResponseMatcher = {
  name: 'output',
  normalize(data, adjust) {
    const parsed = outputShape.safeParse(data);
    if (!parsed.success) {
      return undefined;
    }
    const { output, score } = parsed.data;

    if (adjust) {
      return {
        analysisText: '',
        suggestionsText: '',
        score: score ?? extractScore(output),
        rewrittenText: output,
      };
    }

    const { analysis, suggestions } = splitAnalysisText(output);
    return {
      // One-field mode: with nothing before the marker the suggestions stand in
      analysisText: analysis.trim() ? analysis : suggestions,
      suggestionsText: suggestions,
      score: score ?? extractScore(output),
      rewrittenText: '',
    };
  },
};

export const rewriteMatcher: ResponseMatcher = {
  name: 'rewritten_resume',
  normalize(data) {
    const parsed = rewriteShape.safeParse(data);
    if (!parsed.success) {
      return undefined;
    }
    const { rewritten_resume, analysis, suggestions, score } = parsed.data;
    return {
      analysisText: analysis,
      suggestionsText: suggestions,
      score: score ?? (analysis ? extractScore(analysis) : undefined),
      rewrittenText: rewritten_resume,
    };
  },
};

export const RESPONSE_MATCHERS: readonly ResponseMatcher[] = [outputMatcher, rewriteMatcher];

function isPlainObject(value: unknown): value is WorkingObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Unwrap the response envelope into the working object
 *
 * @throws EmptyResponseError for an empty array
 * @throws MalformedResponseError for anything that is not an object or an array of objects
 */
export function unwrapEnvelope(raw: unknown): WorkingObject {
  if (Array.isArray(raw)) {
    if (raw.length === 0) {
      throw new EmptyResponseError();
    }
    const first: unknown = raw[0];
    if (!isPlainObject(first)) {
      throw new MalformedResponseError(
        `Analysis service returned an array whose first element is ${describe(first)}`,
        { firstElementType: describe(first) }
      );
    }
    return first;
  }

  if (isPlainObject(raw)) {
    return raw;
  }

  throw new MalformedResponseError(`Analysis service returned ${describe(raw)} instead of JSON object`, {
    responseType: describe(raw),
  });
}

/**
 * Normalize a raw webhook response into the canonical result
 */
export function normalizeAnalysisResponse(
  raw: unknown,
  adjust: boolean,
  matchers: readonly ResponseMatcher[] = RESPONSE_MATCHERS
): AnalysisResult {
  const data = unwrapEnvelope(raw);

  for (const matcher of matchers) {
    const result = matcher.normalize(data, adjust);
    if (result) {
      return result;
    }
  }

  throw new MalformedResponseError(
    `Analysis response has none of the expected fields (${matchers.map((m) => m.name).join(', ')})`,
    { receivedFields: Object.keys(data) }
  );
}
