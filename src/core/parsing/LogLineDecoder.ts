import { StreamDecodeError } from '../errors/RenderErrors.js';

export const DEFAULT_VENDOR_PREFIXES = ['[Redshift]'];

const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const lenientDecoder = new TextDecoder('utf-8');

/**
 * Decode one log line. Bytes that are not valid UTF-8 become `\xNN`
 * escapes instead of failing the whole line.
 */
export function decodeLogBytes(bytes: Uint8Array): string {
  try {
    return strictDecode(bytes);
  } catch (error) {
    if (error instanceof StreamDecodeError) {
      return decodeWithEscapes(bytes);
    }
    throw error;
  }
}

function strictDecode(bytes: Uint8Array): string {
  try {
    return strictDecoder.decode(bytes);
  } catch (error) {
    throw new StreamDecodeError(bytes.length, error);
  }
}

export function decodeWithEscapes(bytes: Uint8Array): string {
  let text = '';
  let runStart = 0;
  let i = 0;

  while (i < bytes.length) {
    const length = validSequenceLength(bytes, i);
    if (length > 0) {
      i += length;
      continue;
    }

    if (runStart < i) {
      text += lenientDecoder.decode(bytes.subarray(runStart, i));
    }
    text += `\\x${bytes[i].toString(16).padStart(2, '0')}`;
    i += 1;
    runStart = i;
  }

  if (runStart < bytes.length) {
    text += lenientDecoder.decode(bytes.subarray(runStart));
  }
  return text;
}

/**
 * Length of the well-formed UTF-8 sequence starting at `index`, 0 if there is none
 */
function validSequenceLength(bytes: Uint8Array, index: number): number {
  const lead = bytes[index];
  if (lead < 0x80) return 1;

  let length: number;
  if (lead >= 0xc2 && lead <= 0xdf) length = 2;
  else if (lead >= 0xe0 && lead <= 0xef) length = 3;
  else if (lead >= 0xf0 && lead <= 0xf4) length = 4;
  else return 0;

  if (index + length > bytes.length) return 0;
  for (let k = 1; k < length; k++) {
    if ((bytes[index + k] & 0xc0) !== 0x80) return 0;
  }

  // overlong forms, surrogates and code points past U+10FFFF
  const second = bytes[index + 1];
  if (lead === 0xe0 && second < 0xa0) return 0;
  if (lead === 0xed && second > 0x9f) return 0;
  if (lead === 0xf0 && second < 0x90) return 0;
  if (lead === 0xf4 && second > 0x8f) return 0;

  return length;
}

/**
 * Remove vendor prefix tokens (with the space that follows them) and trailing whitespace
 */
export function normalizeLogLine(text: string, vendorPrefixes: readonly string[] = DEFAULT_VENDOR_PREFIXES): string {
  let line = text;
  for (const prefix of vendorPrefixes) {
    if (!prefix) continue;
    line = line.split(`${prefix} `).join('').split(prefix).join('');
  }
  return line.trimEnd();
}

export class LogLineDecoder {
  private readonly vendorPrefixes: string[];

  constructor(vendorPrefixes: readonly string[] = DEFAULT_VENDOR_PREFIXES) {
    this.vendorPrefixes = vendorPrefixes.map((prefix) => prefix.trim()).filter((prefix) => prefix.length > 0);
  }

  decode(bytes: Uint8Array): string {
    return normalizeLogLine(decodeLogBytes(bytes), this.vendorPrefixes);
  }
}
