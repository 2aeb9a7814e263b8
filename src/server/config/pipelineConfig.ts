/**
 * Pipeline Configuration
 *
 * The explicit, immutable configuration struct handed to every pipeline component.
 * Components never read process.env; tests build this struct directly.
 */
import type { Env } from './env.js';

export const DEFAULT_SKILLS_KEYWORDS: readonly string[] = [
  'habilidades',
  'skills',
  'competências',
  'competencias',
  'ferramentas',
  'softwares',
];

export interface AnalysisClientConfig {
  webhookUrl: string;
  timeoutMs: number;
}

export interface LayoutConfig {
  /** Lower-case substrings that mark a section title as a skills section */
  skillsKeywords: readonly string[];
  /** Minimum bullet count for a skills section to render in two columns */
  twoColumnMinBullets: number;
}

export interface PipelineConfig {
  maxUploadBytes: number;
  analysis: AnalysisClientConfig;
  layout: LayoutConfig;
}

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  skillsKeywords: DEFAULT_SKILLS_KEYWORDS,
  twoColumnMinBullets: 6,
};

export function loadPipelineConfig(env: Env): PipelineConfig {
  return Object.freeze({
    maxUploadBytes: env.MAX_FILE_SIZE_MB * 1024 * 1024,
    analysis: Object.freeze({
      webhookUrl: env.ANALYSIS_WEBHOOK_URL,
      timeoutMs: env.ANALYSIS_TIMEOUT_SECONDS * 1000,
    }),
    layout: Object.freeze({
      skillsKeywords: DEFAULT_SKILLS_KEYWORDS,
      twoColumnMinBullets: env.SKILLS_TWO_COLUMN_MIN_BULLETS,
    }),
  });
}
