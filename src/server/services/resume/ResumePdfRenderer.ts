/**
 * Resume PDF Renderer
 *
 * Lays rewritten resume text out as an A4 PDF with pdfkit: name and contact line on top,
 * ruled section headings, accent-coloured bullets and two-column skills lists.
 * The document is produced entirely in memory.
 */

import PDFDocument from 'pdfkit';
import { DEFAULT_LAYOUT_CONFIG } from '../../config/pipelineConfig.js';
import type { LayoutConfig } from '../../config/pipelineConfig.js';
import type {
  BulletBlock,
  ContactHeader,
  HeadingBlock,
  ParagraphBlock,
  RenderedDocument,
  ResumeBlock,
  TwoColumnListBlock,
} from '../../types/resume.js';
import { logger } from '../../utils/logger.js';
import { parseResumeLayout } from './ResumeLayoutParser.js';
import { keepTogetherHeight, needsPageBreak } from './pagination.js';
import type { PageFrame } from './pagination.js';
import { sanitizeForStandardFonts } from './textSanitizer.js';

const CM = 72 / 2.54;
const MM = CM / 10;

const PAGE_MARGINS = {
  top: 1.5 * CM,
  bottom: 1.5 * CM,
  left: 2 * CM,
  right: 2 * CM,
};

const A4_WIDTH = 595.28;
const CONTENT_WIDTH = A4_WIDTH - PAGE_MARGINS.left - PAGE_MARGINS.right;
const LEFT = PAGE_MARGINS.left;

const COLORS = {
  primary: '#1B2A4A',
  accent: '#1B2A4A',
  text: '#2C2C2C',
  lightText: '#555555',
} as const;

const FONTS = {
  regular: 'Helvetica',
  bold: 'Helvetica-Bold',
} as const;

const NAME_SIZE = 24;
const CONTACT_SIZE = 9;
const HEADING_SIZE = 11;
const BODY_SIZE = 9.5;
const ROLE_SIZE = 10;
const BODY_LINE_GAP = 2;

const HEADING_SPACE_BEFORE = 10;
const HEADING_LINE_HEIGHT = 14;
const HEADING_RULE_GAP = 2;
const HEADING_SPACE_AFTER = 6;
const HEADING_RULE_WIDTH = 0.8;

const BULLET_RADIUS = 2.2;
const BULLET_INDENT = 14;
const BULLET_SPACE_AFTER = 2;
const PARAGRAPH_SPACE_AFTER = 4;
const ROLE_SPACE_BEFORE = 6;

const COLUMN_GUTTER = 4 * MM;
const COLUMN_WIDTH = (CONTENT_WIDTH - COLUMN_GUTTER) / 2;
const COLUMN_BULLET_INDENT = 10;
const ROW_PADDING = 2;

const DEFAULT_CANDIDATE_LABEL = 'Candidato';

export interface RenderOptions {
  /** Shown in the PDF title metadata; defaults to the name parsed from the text */
  candidateName?: string;
}

type Doc = PDFKit.PDFDocument;

export class ResumePdfRenderer {
  constructor(private readonly layout: LayoutConfig = DEFAULT_LAYOUT_CONFIG) {}

  /**
   * Render rewritten resume text to PDF bytes
   */
  async render(rewrittenText: string, options: RenderOptions = {}): Promise<Buffer> {
    const parsed = parseResumeLayout(sanitizeForStandardFonts(rewrittenText), this.layout);
    const candidate = options.candidateName?.trim() || parsed.header?.name || DEFAULT_CANDIDATE_LABEL;

    return new Promise((resolve, reject) => {
      try {
        const doc = new PDFDocument({
          size: 'A4',
          margins: PAGE_MARGINS,
          info: {
            Title: `Currículo - ${candidate}`,
            Author: 'Resume Review Service',
          },
        });
        const chunks: Buffer[] = [];
        let pages = 1;

        doc.on('pageAdded', () => {
          pages += 1;
        });
        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => {
          const buffer = Buffer.concat(chunks);
          logger.info(
            { pages, blocks: parsed.blocks.length, bytes: buffer.length },
            'Resume PDF rendered'
          );
          resolve(buffer);
        });
        doc.on('error', reject);

        this.drawDocument(doc, parsed);

        doc.end();
      } catch (error) {
        logger.error({ error }, 'Failed to render resume PDF');
        reject(error);
      }
    });
  }

  private drawDocument(doc: Doc, parsed: RenderedDocument): void {
    if (parsed.header) {
      this.drawHeader(doc, parsed.header);
    }

    const { blocks } = parsed;
    blocks.forEach((block, index) => {
      const required = keepTogetherHeight(blocks, index, (candidate) =>
        this.minHeight(doc, candidate)
      );
      if (needsPageBreak(doc.y, required, this.frame(doc))) {
        doc.addPage();
      }
      this.drawBlock(doc, block);
    });
  }

  private drawBlock(doc: Doc, block: ResumeBlock): void {
    switch (block.kind) {
      case 'heading':
        this.drawHeading(doc, block);
        break;
      case 'bullet':
        this.drawBullet(doc, block);
        break;
      case 'paragraph':
        this.drawParagraph(doc, block);
        break;
      case 'two-column':
        this.drawTwoColumns(doc, block);
        break;
    }
  }

  private frame(doc: Doc): PageFrame {
    return {
      top: doc.page.margins.top,
      bottom: doc.page.height - doc.page.margins.bottom,
    };
  }

  private isAtPageTop(doc: Doc): boolean {
    return doc.y <= doc.page.margins.top;
  }

  /**
   * Height a block needs before it may start on the current page:
   * bullets in full, paragraphs one line, two-column lists one row.
   */
  private minHeight(doc: Doc, block: ResumeBlock): number {
    switch (block.kind) {
      case 'heading':
        return (
          HEADING_SPACE_BEFORE +
          this.headingTextHeight(doc, block) +
          HEADING_RULE_GAP +
          HEADING_SPACE_AFTER
        );
      case 'bullet':
        return this.bulletHeight(doc, block.text) + BULLET_SPACE_AFTER;
      case 'paragraph':
        this.useParagraphFont(doc, block);
        return doc.currentLineHeight(true) + BODY_LINE_GAP;
      case 'two-column':
        return this.rowHeight(doc, block.left[0], block.right[0]);
    }
  }

  private useBodyFont(doc: Doc): Doc {
    return doc.font(FONTS.regular).fontSize(BODY_SIZE).fillColor(COLORS.text);
  }

  private useParagraphFont(doc: Doc, block: ParagraphBlock): Doc {
    return block.emphasis === 'role'
      ? doc.font(FONTS.bold).fontSize(ROLE_SIZE).fillColor(COLORS.text)
      : this.useBodyFont(doc);
  }

  private bulletHeight(doc: Doc, text: string): number {
    this.useBodyFont(doc);
    return doc.heightOfString(text, { width: CONTENT_WIDTH - BULLET_INDENT, lineGap: BODY_LINE_GAP });
  }

  private cellHeight(doc: Doc, text: string | undefined): number {
    if (!text) {
      return 0;
    }
    this.useBodyFont(doc);
    return doc.heightOfString(text, {
      width: COLUMN_WIDTH - COLUMN_BULLET_INDENT,
      lineGap: BODY_LINE_GAP,
    });
  }

  private rowHeight(doc: Doc, left: string | undefined, right: string | undefined): number {
    return Math.max(this.cellHeight(doc, left), this.cellHeight(doc, right)) + 2 * ROW_PADDING;
  }

  private drawHeader(doc: Doc, header: ContactHeader): void {
    doc
      .font(FONTS.bold)
      .fontSize(NAME_SIZE)
      .fillColor(COLORS.text)
      .text(header.name.toUpperCase(), LEFT, doc.y, { width: CONTENT_WIDTH, lineGap: 2 });

    if (header.contactLines.length > 0) {
      doc.y += 2;
      doc
        .font(FONTS.regular)
        .fontSize(CONTACT_SIZE)
        .fillColor(COLORS.lightText)
        .text(header.contactLines.join(' | '), LEFT, doc.y, { width: CONTENT_WIDTH, lineGap: 2 });
    }
    doc.y += 12;
  }

  /** Leaves the heading font selected; titles wrap, so the height is measured */
  private headingTextHeight(doc: Doc, block: HeadingBlock): number {
    doc.font(FONTS.bold).fontSize(HEADING_SIZE);
    return Math.max(HEADING_LINE_HEIGHT, doc.heightOfString(block.title, { width: CONTENT_WIDTH }));
  }

  private drawHeading(doc: Doc, block: HeadingBlock): void {
    if (!this.isAtPageTop(doc)) {
      doc.y += HEADING_SPACE_BEFORE;
    }
    const top = doc.y;
    const textHeight = this.headingTextHeight(doc, block);

    doc.fillColor(COLORS.primary).text(block.title, LEFT, top, { width: CONTENT_WIDTH });

    const ruleY = top + textHeight + HEADING_RULE_GAP;
    doc
      .moveTo(LEFT, ruleY)
      .lineTo(LEFT + CONTENT_WIDTH, ruleY)
      .lineWidth(HEADING_RULE_WIDTH)
      .strokeColor(COLORS.primary)
      .stroke();

    doc.y = ruleY + HEADING_SPACE_AFTER;
  }

  private drawBulletGlyph(doc: Doc, x: number, y: number): void {
    doc.circle(x, y + BODY_SIZE * 0.55, BULLET_RADIUS).fill(COLORS.accent);
  }

  private drawBullet(doc: Doc, block: BulletBlock): void {
    const top = doc.y;
    this.drawBulletGlyph(doc, LEFT + 4, top);

    this.useBodyFont(doc).text(block.text, LEFT + BULLET_INDENT, top, {
      width: CONTENT_WIDTH - BULLET_INDENT,
      lineGap: BODY_LINE_GAP,
      align: 'justify',
    });
    doc.y += BULLET_SPACE_AFTER;
  }

  private drawParagraph(doc: Doc, block: ParagraphBlock): void {
    if (block.emphasis === 'role' && !this.isAtPageTop(doc)) {
      doc.y += ROLE_SPACE_BEFORE;
    }
    this.useParagraphFont(doc, block).text(block.text, LEFT, doc.y, {
      width: CONTENT_WIDTH,
      lineGap: BODY_LINE_GAP,
      align: block.emphasis === 'role' ? 'left' : 'justify',
    });
    doc.y += block.emphasis === 'role' ? BULLET_SPACE_AFTER : PARAGRAPH_SPACE_AFTER;
  }

  private drawTwoColumns(doc: Doc, block: TwoColumnListBlock): void {
    const rows = Math.max(block.left.length, block.right.length);

    for (let row = 0; row < rows; row++) {
      const left = block.left[row];
      const right = block.right[row];
      const height = this.rowHeight(doc, left, right);

      if (needsPageBreak(doc.y, height, this.frame(doc))) {
        doc.addPage();
      }

      const top = doc.y + ROW_PADDING;
      this.drawCell(doc, left, LEFT, top);
      this.drawCell(doc, right, LEFT + COLUMN_WIDTH + COLUMN_GUTTER, top);
      doc.y = top - ROW_PADDING + height;
    }
    doc.y += PARAGRAPH_SPACE_AFTER;
  }

  private drawCell(doc: Doc, text: string | undefined, x: number, top: number): void {
    if (!text) {
      return;
    }
    this.drawBulletGlyph(doc, x + 3, top);
    this.useBodyFont(doc).text(text, x + COLUMN_BULLET_INDENT, top, {
      width: COLUMN_WIDTH - COLUMN_BULLET_INDENT,
      lineGap: BODY_LINE_GAP,
    });
  }
}
