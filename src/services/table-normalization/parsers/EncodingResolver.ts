import { logger } from '../../../config/logger';
import { config } from '../../../config/env';
import { EncodingUndetectableError } from '../../../errors';

export interface DecodedText {
  text: string;
  encoding: string;
}

/**
 * Decodes uploaded bytes with the first candidate encoding that accepts them
 */
export class EncodingResolver {
  static decode(buffer: Uint8Array, candidates: string[] = config.conversion.encodingCandidates): DecodedText {
    for (const encoding of candidates) {
      let decoder: TextDecoder;
      try {
        decoder = new TextDecoder(encoding, { fatal: true });
      } catch (error) {
        logger.warn(`Encoding ${encoding} is not supported by this runtime, skipping`, error);
        continue;
      }

      try {
        // The decoder drops a leading UTF-8 byte order mark
        const text = decoder.decode(buffer);
        logger.debug(`Decoded ${buffer.byteLength} bytes as ${encoding}`);
        return { text, encoding };
      } catch {
        logger.debug(`Input is not valid ${encoding}`);
      }
    }

    throw new EncodingUndetectableError(candidates);
  }
}
