import { LogLineDecoder, decodeLogBytes, decodeWithEscapes, normalizeLogLine } from '../src/core/parsing/LogLineDecoder.js';

describe('decodeLogBytes', () => {
  test('decodes valid UTF-8 unchanged', () => {
    expect(decodeLogBytes(Buffer.from('Frame range: 1-10 ✓', 'utf8'))).toBe('Frame range: 1-10 ✓');
  });

  test('escapes invalid bytes instead of failing the line', () => {
    const bytes = Buffer.from([0x41, 0xff, 0x42]);
    expect(decodeLogBytes(bytes)).toBe('A\\xffB');
  });

  test('keeps valid multi-byte sequences around an invalid byte', () => {
    // "é" is c3 a9, then a lone continuation byte
    const bytes = Buffer.from([0xc3, 0xa9, 0x80, 0x21]);
    expect(decodeWithEscapes(bytes)).toBe('é\\x80!');
  });

  test('escapes a truncated sequence at the end of the line byte by byte', () => {
    const bytes = Buffer.from([0x6f, 0x6b, 0xe2, 0x82]);
    expect(decodeLogBytes(bytes)).toBe('ok\\xe2\\x82');
  });

  test('rejects overlong encodings', () => {
    const bytes = Buffer.from([0xc0, 0xaf]);
    expect(decodeLogBytes(bytes)).toBe('\\xc0\\xaf');
  });
});

describe('normalizeLogLine', () => {
  test('strips the vendor prefix and the space after it', () => {
    expect(normalizeLogLine('[Redshift] Block 3/16 rendered')).toBe('Block 3/16 rendered');
  });

  test('strips a prefix without a trailing space', () => {
    expect(normalizeLogLine('[Redshift]Loading RS rendering options')).toBe('Loading RS rendering options');
  });

  test('trims trailing whitespace and carriage returns', () => {
    expect(normalizeLogLine('ROP node endRender  \r')).toBe('ROP node endRender');
  });

  test('leaves lines without a prefix alone', () => {
    expect(normalizeLogLine("'Redshift_ROP1' rendering frame 5")).toBe("'Redshift_ROP1' rendering frame 5");
  });

  test('supports custom prefixes', () => {
    expect(normalizeLogLine('[Karma] [Redshift] Block 1/4', ['[Karma]', '[Redshift]'])).toBe('Block 1/4');
  });
});

describe('LogLineDecoder', () => {
  test('decodes and normalizes in one step', () => {
    const decoder = new LogLineDecoder();
    expect(decoder.decode(Buffer.from('[Redshift] Block 1/4\r'))).toBe('Block 1/4');
  });

  test('ignores blank configured prefixes', () => {
    const decoder = new LogLineDecoder(['  ', '[Redshift] ']);
    expect(decoder.decode(Buffer.from('[Redshift] Saved file'))).toBe('Saved file');
  });
});
