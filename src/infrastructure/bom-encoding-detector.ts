import type { EncodingDetectorPort } from '../application/ports/encoding-detector.port';
import { ENCODING, decodeStrict } from '../domain/encoding';
import type { Encoding } from '../domain/encoding';

const startsWith = (bytes: Uint8Array, prefix: number[]) =>
  prefix.every((byte, index) => bytes[index] === byte);

/**
 * Recommends an encoding from a byte order mark, else from whether the
 * content is valid UTF-8. Anything else is reported as latin1, which can
 * represent every byte.
 */
export class BomEncodingDetector implements EncodingDetectorPort {
  public detect(bytes: Uint8Array): Encoding | null {
    if (bytes.length === 0) {
      return null;
    }
    if (startsWith(bytes, [0xef, 0xbb, 0xbf])) {
      return ENCODING.UTF8;
    }
    if (startsWith(bytes, [0xff, 0xfe])) {
      return ENCODING.UTF16LE;
    }
    if (startsWith(bytes, [0xfe, 0xff])) {
      return ENCODING.UTF16BE;
    }
    if (bytes.every((byte) => byte < 0x80)) {
      return ENCODING.ASCII;
    }

    try {
      decodeStrict(bytes, ENCODING.UTF8);
      return ENCODING.UTF8;
    } catch {
      return ENCODING.LATIN1;
    }
  }
}
