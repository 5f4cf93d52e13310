import { BomEncodingDetector } from '../bom-encoding-detector';

describe('BomEncodingDetector', () => {
  const detector = new BomEncodingDetector();

  it.each([
    ['a UTF-8 byte order mark', [0xef, 0xbb, 0xbf, 0x61], 'utf-8'],
    ['a UTF-16LE byte order mark', [0xff, 0xfe, 0x61, 0x00], 'utf-16le'],
    ['a UTF-16BE byte order mark', [0xfe, 0xff, 0x00, 0x61], 'utf-16be'],
    ['plain ASCII', [0x68, 0x69], 'ascii'],
    ['multi-byte UTF-8', [0x63, 0x61, 0x66, 0xc3, 0xa9], 'utf-8'],
    ['bytes that are not UTF-8', [0x63, 0x61, 0x66, 0xe9], 'latin1'],
  ])('should recognise %s', (_label, bytes, expected) => {
    expect(detector.detect(Uint8Array.from(bytes))).toBe(expected);
  });

  it('should give no hint for empty content', () => {
    expect(detector.detect(new Uint8Array(0))).toBeNull();
  });
});
