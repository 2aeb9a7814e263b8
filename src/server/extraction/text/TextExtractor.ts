/**
 * TextExtractor - Decode plain-text uploads
 */

import { DecodeError } from '../../types/errors.js';

export class TextExtractor {
  // fatal: invalid sequences throw instead of becoming U+FFFD; a leading BOM is dropped
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  extract(buffer: Buffer): string {
    try {
      return this.decoder.decode(buffer);
    } catch (error) {
      throw new DecodeError('Text file is not valid UTF-8', {
        byteLength: buffer.length,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
