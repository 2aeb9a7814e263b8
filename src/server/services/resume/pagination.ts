/**
 * Page-break decisions for the resume renderer, kept free of pdfkit so they can
 * be tested with plain numbers.
 */

import type { ResumeBlock } from '../../types/resume.js';

/** Height a block needs on the current page before it may start there */
export type MinHeightFn = (block: ResumeBlock) => number;

/**
 * Space to reserve before drawing the block at `index`. A heading reserves its
 * own height plus the minimum height of the block after it, so it never ends a page alone.
 */
export function keepTogetherHeight(
  blocks: readonly ResumeBlock[],
  index: number,
  minHeight: MinHeightFn
): number {
  const block = blocks[index];
  if (!block) {
    return 0;
  }
  const own = minHeight(block);
  if (block.kind !== 'heading') {
    return own;
  }
  const next = blocks[index + 1];
  return next ? own + minHeight(next) : own;
}

export interface PageFrame {
  /** First usable y coordinate (top margin) */
  top: number;
  /** Last usable y coordinate (page height minus bottom margin) */
  bottom: number;
}

/**
 * True when `required` points do not fit between `y` and the bottom of the frame.
 * A block at the top of a fresh page never forces another break, however tall it is.
 */
export function needsPageBreak(y: number, required: number, frame: PageFrame): boolean {
  if (y <= frame.top) {
    return false;
  }
  return y + required > frame.bottom;
}
