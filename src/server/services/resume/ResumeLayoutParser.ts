/**
 * ResumeLayoutParser - Turn rewritten resume text into typed layout blocks
 *
 * The input is plain text structured by convention: the candidate's name on the
 * first line, a contact line or two, then sections with uppercase titles and
 * dash-prefixed bullets. Parsing is a line-oriented state machine:
 *
 *   BeforeContact → InContact → InSection ⇄ InBulletRun
 */

import { DEFAULT_LAYOUT_CONFIG } from '../../config/pipelineConfig.js';
import type { LayoutConfig } from '../../config/pipelineConfig.js';
import type {
  ContactHeader,
  RenderedDocument,
  ResumeBlock,
  TwoColumnListBlock,
} from '../../types/resume.js';

export type ParserState = 'BeforeContact' | 'InContact' | 'InSection' | 'InBulletRun';

export type ClassifiedLine =
  | { type: 'blank' }
  | { type: 'rule' }
  | { type: 'heading'; title: string; inline: string }
  | { type: 'bullet'; text: string }
  | { type: 'text'; text: string; indented: boolean };

const BULLET_MARKERS = ['-', '•', '*', '–', '—', '►', '▪', '●'];

const RULE_LINE = /^[-_=]{3,}$/;

const MAX_HEADING_LENGTH = 60;
const MAX_CONTACT_LINES = 3;
const MAX_SHORT_LINE_LENGTH = 120;
/** "Title: content" splits into heading + paragraph only when content is longer than this */
const MIN_INLINE_CONTENT_LENGTH = 10;

/** Whole-title matches only, so prose opening with "Experiência ..." stays a paragraph */
const SECTION_TITLE_PATTERNS: readonly RegExp[] = [
  /^resum[oé](\s+profissional)?$/i,
  /^experi[eê]ncias?(\s+profissiona(l|is))?$/i,
  /^forma[çc][aã]o(\s+acad[eê]mica)?$/i,
  /^habilidades(\s+t[eé]cnicas|\s+e\s+compet[eê]ncias)?$/i,
  /^compet[eê]ncias(\s+t[eé]cnicas)?$/i,
  /^softwares?(\s+e\s+ferramentas)?$/i,
  /^ferramentas(\s+e\s+softwares?)?$/i,
  /^idiomas$/i,
  /^certifica[çc][oõ]es(\s+e\s+cursos)?$/i,
  /^cursos(\s+complementares|\s+e\s+certifica[çc][oõ]es)?$/i,
  /^projetos(\s+relevantes)?$/i,
  /^objetivos?(\s+profissional)?$/i,
  /^informa[çc][oõ]es\s+(adicionais|pessoais|complementares)$/i,
  /^refer[eê]ncias$/i,
  /^atividades(\s+complementares|\s+extracurriculares)?$/i,
  /^trabalhos?\s+volunt[aá]rios?$/i,
  /^(professional\s+|work\s+)?(summary|experience)$/i,
  /^education$/i,
  /^(technical\s+)?skills$/i,
  /^languages$/i,
  /^certifications$/i,
  /^projects$/i,
];

const CONTACT_HINTS = ['@', 'linkedin', 'github', 'telefone', 'tel:', 'fone:', 'celular', 'phone'];
const PHONE_PATTERN = /\(?\d{2}\)?\s*\d{4,5}-?\d{4}/;

function looksLikeContact(line: string): boolean {
  const lower = line.toLowerCase();
  return CONTACT_HINTS.some((hint) => lower.includes(hint)) || PHONE_PATTERN.test(line);
}

function isUppercaseTitle(title: string): boolean {
  return title === title.toUpperCase() && title !== title.toLowerCase();
}

function isSectionTitle(title: string): boolean {
  return (
    title.length > 0 &&
    title.length < MAX_HEADING_LENGTH &&
    (isUppercaseTitle(title) || SECTION_TITLE_PATTERNS.some((pattern) => pattern.test(title)))
  );
}

function splitTitle(line: string): { title: string; inline: string } {
  const colon = line.indexOf(':');
  if (colon >= 0) {
    const title = line.slice(0, colon).trim();
    const inline = line.slice(colon + 1).trim();
    if (inline.length > MIN_INLINE_CONTENT_LENGTH) {
      return { title, inline };
    }
  }
  return { title: line.replace(/:+$/, '').trim(), inline: '' };
}

/**
 * Classify one raw line. Order matters: a dashed rule is not a bullet,
 * and a bullet is never a heading.
 */
export function classifyLine(rawLine: string): ClassifiedLine {
  const line = rawLine.trim();
  if (line.length === 0) {
    return { type: 'blank' };
  }
  if (RULE_LINE.test(line)) {
    return { type: 'rule' };
  }
  if (BULLET_MARKERS.includes(line[0])) {
    return { type: 'bullet', text: line.slice(1).trim() };
  }

  const { title, inline } = splitTitle(line);
  if (isSectionTitle(title)) {
    return { type: 'heading', title, inline };
  }

  return { type: 'text', text: line, indented: /^\s/.test(rawLine) };
}

interface SectionDraft {
  title?: string;
  blocks: ResumeBlock[];
}

export function isSkillsTitle(title: string, config: LayoutConfig): boolean {
  const lower = title.toLowerCase();
  return config.skillsKeywords.some((keyword) => lower.includes(keyword));
}

/**
 * Distribute bullets into two columns: even indices left, odd indices right,
 * keeping the original order inside each column.
 */
export function distributeColumns(items: readonly string[]): TwoColumnListBlock {
  const left: string[] = [];
  const right: string[] = [];
  items.forEach((item, index) => {
    (index % 2 === 0 ? left : right).push(item);
  });
  return { kind: 'two-column', left, right };
}

function finalizeSection(section: SectionDraft, config: LayoutConfig): ResumeBlock[] {
  const blocks: ResumeBlock[] = [];
  if (section.title) {
    blocks.push({ kind: 'heading', title: section.title.toUpperCase() });
  }

  const bullets = section.blocks.flatMap((block) => (block.kind === 'bullet' ? [block.text] : []));
  const twoColumns =
    section.title !== undefined &&
    isSkillsTitle(section.title, config) &&
    bullets.length >= config.twoColumnMinBullets;

  if (!twoColumns) {
    return blocks.concat(section.blocks);
  }

  // The list takes the place of the first bullet; other blocks keep their positions
  let placed = false;
  for (const block of section.blocks) {
    if (block.kind !== 'bullet') {
      blocks.push(block);
    } else if (!placed) {
      blocks.push(distributeColumns(bullets));
      placed = true;
    }
  }
  return blocks;
}

/**
 * Parse rewritten resume text into a header and a flat list of blocks
 */
export function parseResumeLayout(
  text: string,
  config: LayoutConfig = DEFAULT_LAYOUT_CONFIG
): RenderedDocument {
  let state: ParserState = 'BeforeContact';
  let header: ContactHeader | undefined;
  let blankSinceName = false;
  const sections: SectionDraft[] = [];
  let current: SectionDraft | undefined;

  const section = (): SectionDraft => {
    if (!current) {
      current = { blocks: [] };
      sections.push(current);
    }
    return current;
  };

  const openSection = (title: string, inline: string): void => {
    current = { title, blocks: [] };
    sections.push(current);
    if (inline) {
      current.blocks.push({ kind: 'paragraph', text: inline, emphasis: 'body' });
    }
    state = 'InSection';
  };

  const addText = (text: string): void => {
    const isRole = text.includes('|') && text.length < MAX_SHORT_LINE_LENGTH;
    section().blocks.push({ kind: 'paragraph', text, emphasis: isRole ? 'role' : 'body' });
    state = 'InSection';
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = classifyLine(rawLine);

    switch (state) {
      case 'BeforeContact': {
        if (line.type === 'blank' || line.type === 'rule') break;
        // An all-caps name classifies as a heading; the raw line is the name either way
        header = { name: line.type === 'heading' ? rawLine.trim() : line.text, contactLines: [] };
        state = 'InContact';
        break;
      }

      case 'InContact': {
        if (!header) break;
        if (line.type === 'blank') {
          if (header.contactLines.length > 0) {
            state = 'InSection';
          } else {
            blankSinceName = true;
          }
          break;
        }
        if (line.type === 'rule') break;
        if (line.type === 'heading') {
          openSection(line.title, line.inline);
          break;
        }
        if (line.type === 'bullet') {
          section().blocks.push({ kind: 'bullet', text: line.text });
          state = 'InBulletRun';
          break;
        }
        const acceptsContact =
          header.contactLines.length < MAX_CONTACT_LINES &&
          line.text.length < MAX_SHORT_LINE_LENGTH &&
          (looksLikeContact(line.text) || !blankSinceName);
        if (acceptsContact) {
          header.contactLines.push(line.text);
        } else {
          addText(line.text);
        }
        break;
      }

      case 'InSection':
      case 'InBulletRun': {
        if (line.type === 'blank') {
          state = 'InSection';
          break;
        }
        if (line.type === 'rule') break;
        if (line.type === 'heading') {
          openSection(line.title, line.inline);
          break;
        }
        if (line.type === 'bullet') {
          section().blocks.push({ kind: 'bullet', text: line.text });
          state = 'InBulletRun';
          break;
        }

        // An indented line right after a bullet continues that bullet
        const blocks = section().blocks;
        const last = blocks[blocks.length - 1];
        if (state === 'InBulletRun' && line.indented && last?.kind === 'bullet') {
          last.text = `${last.text} ${line.text}`;
          break;
        }
        addText(line.text);
        break;
      }
    }
  }

  return {
    header,
    blocks: sections.flatMap((draft) => finalizeSection(draft, config)),
  };
}
