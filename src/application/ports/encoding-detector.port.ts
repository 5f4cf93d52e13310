import type { Encoding } from '../../domain/encoding';

export interface EncodingDetectorPort {
  /**
   * Recommend an encoding for the given file content, or null when the bytes
   * give no usable hint.
   */
  detect(bytes: Uint8Array): Encoding | null;
}
