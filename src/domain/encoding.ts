import type { ValueOf } from '../types/value-of';

export const ENCODING = {
  UTF8: 'utf-8',
  UTF16LE: 'utf-16le',
  UTF16BE: 'utf-16be',
  LATIN1: 'latin1',
  ASCII: 'ascii',
} as const;

export type Encoding = ValueOf<typeof ENCODING>;

export type EncodingAttempt = {
  encoding: string;
  fallback: boolean;
  ok: boolean;
  reason?: string;
};

const ALIASES: Record<string, Encoding> = {
  utf8: ENCODING.UTF8,
  utf16le: ENCODING.UTF16LE,
  ucs2: ENCODING.UTF16LE,
  utf16be: ENCODING.UTF16BE,
  latin1: ENCODING.LATIN1,
  iso88591: ENCODING.LATIN1,
  l1: ENCODING.LATIN1,
  ascii: ENCODING.ASCII,
  usascii: ENCODING.ASCII,
};

export class CharacterConversionError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'CharacterConversionError';
  }
}

/** Map an encoding label to the token the codec understands. */
export const normalizeEncoding = (label: string): Encoding => {
  const key = label.trim().toLowerCase().replace(/[-_\s]/g, '');
  const encoding = ALIASES[key];
  if (!encoding) {
    throw new CharacterConversionError(`Unsupported encoding: ${label}`);
  }
  return encoding;
};

export const isUtf8 = (label: string): boolean => {
  try {
    return normalizeEncoding(label) === ENCODING.UTF8;
  } catch {
    return false;
  }
};

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const assertWellFormed = (text: string, encoding: Encoding) => {
  if (LONE_SURROGATE.test(text)) {
    throw new CharacterConversionError(`Text contains a lone surrogate and cannot be written as ${encoding}`);
  }
};

const assertCodeUnitsBelow = (text: string, limit: number, encoding: Encoding) => {
  for (let index = 0; index < text.length; index += 1) {
    if (text.charCodeAt(index) >= limit) {
      throw new CharacterConversionError(
        `Character at offset ${index} cannot be represented in ${encoding}`,
      );
    }
  }
};

const fatalDecode = (bytes: Uint8Array, label: string): string => {
  try {
    return new TextDecoder(label, { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    throw new CharacterConversionError(error instanceof Error ? error.message : String(error));
  }
};

/** Decode bytes, failing on any malformed sequence instead of substituting. */
export const decodeStrict = (bytes: Uint8Array, label: string): string => {
  const encoding = normalizeEncoding(label);
  switch (encoding) {
    case ENCODING.UTF8:
    case ENCODING.UTF16LE:
    case ENCODING.UTF16BE:
      return fatalDecode(bytes, encoding);
    case ENCODING.LATIN1:
      return Buffer.from(bytes).toString('latin1');
    case ENCODING.ASCII: {
      const offset = bytes.findIndex((byte) => byte > 0x7f);
      if (offset !== -1) {
        throw new CharacterConversionError(`Byte at offset ${offset} is not ASCII`);
      }
      return Buffer.from(bytes).toString('latin1');
    }
  }
};

/** Encode text, failing on any character the target cannot represent. */
export const encodeStrict = (text: string, label: string): Uint8Array => {
  const encoding = normalizeEncoding(label);
  switch (encoding) {
    case ENCODING.UTF8:
      assertWellFormed(text, encoding);
      return Buffer.from(text, 'utf8');
    case ENCODING.UTF16LE:
      assertWellFormed(text, encoding);
      return Buffer.from(text, 'utf16le');
    case ENCODING.UTF16BE:
      assertWellFormed(text, encoding);
      return Buffer.from(text, 'utf16le').swap16();
    case ENCODING.LATIN1:
      assertCodeUnitsBelow(text, 0x100, encoding);
      return Buffer.from(text, 'latin1');
    case ENCODING.ASCII:
      assertCodeUnitsBelow(text, 0x80, encoding);
      return Buffer.from(text, 'latin1');
  }
};
