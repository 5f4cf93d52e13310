import { CharacterConversionError, ENCODING, decodeStrict, encodeStrict, isUtf8, normalizeEncoding } from '../encoding';

describe('normalizeEncoding', () => {
  it.each([
    ['UTF8', ENCODING.UTF8],
    ['utf-8', ENCODING.UTF8],
    ['ISO-8859-1', ENCODING.LATIN1],
    ['US-ASCII', ENCODING.ASCII],
    ['UCS-2', ENCODING.UTF16LE],
    ['utf_16be', ENCODING.UTF16BE],
  ])('should map %s to %s', (label, expected) => {
    expect(normalizeEncoding(label)).toBe(expected);
  });

  it('should reject unknown encodings', () => {
    expect(() => normalizeEncoding('klingon')).toThrow(CharacterConversionError);
  });

  it('should recognise UTF-8 aliases', () => {
    expect(isUtf8('UTF8')).toBe(true);
    expect(isUtf8('latin1')).toBe(false);
    expect(isUtf8('klingon')).toBe(false);
  });
});

describe('decodeStrict', () => {
  it('should decode valid UTF-8', () => {
    expect(decodeStrict(Buffer.from('héllo', 'utf8'), 'utf-8')).toBe('héllo');
  });

  it('should fail on malformed UTF-8 instead of substituting', () => {
    expect(() => decodeStrict(Uint8Array.from([0x61, 0xff, 0x62]), 'utf-8')).toThrow(CharacterConversionError);
  });

  it('should fail on bytes outside ASCII', () => {
    expect(() => decodeStrict(Buffer.from('héllo', 'utf8'), 'ascii')).toThrow(CharacterConversionError);
  });

  it('should map every byte under latin1', () => {
    expect(decodeStrict(Uint8Array.from([0x63, 0x61, 0x66, 0xe9]), 'latin1')).toBe('café');
  });

  it('should decode big-endian UTF-16', () => {
    expect(decodeStrict(Uint8Array.from([0x00, 0x41, 0x00, 0x42]), 'utf-16be')).toBe('AB');
  });

  it.each([
    ['utf-8', [0xef, 0xbb, 0xbf, 0x61]],
    ['utf-16le', [0xff, 0xfe, 0x61, 0x00]],
    ['utf-16be', [0xfe, 0xff, 0x00, 0x61]],
  ])('should keep a leading byte order mark under %s', (label, bytes) => {
    expect(decodeStrict(Uint8Array.from(bytes), label)).toBe('\uFEFFa');
  });
});

describe('encodeStrict', () => {
  it('should encode latin1 characters as single bytes', () => {
    expect(Array.from(encodeStrict('é', 'latin1'))).toEqual([0xe9]);
  });

  it('should fail on characters latin1 cannot represent', () => {
    expect(() => encodeStrict('€', 'latin1')).toThrow(CharacterConversionError);
  });

  it('should fail on characters ASCII cannot represent', () => {
    expect(() => encodeStrict('é', 'ascii')).toThrow(CharacterConversionError);
  });

  it('should write big-endian UTF-16', () => {
    expect(Array.from(encodeStrict('A', 'utf-16be'))).toEqual([0x00, 0x41]);
  });

  it('should fail on lone surrogates in UTF-8', () => {
    expect(() => encodeStrict('a\uD800b', 'utf-8')).toThrow(CharacterConversionError);
  });

  it('should accept surrogate pairs in UTF-8', () => {
    expect(Array.from(encodeStrict('🚀', 'utf-8'))).toEqual([0xf0, 0x9f, 0x9a, 0x80]);
  });
});
