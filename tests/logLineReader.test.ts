import { PassThrough } from 'stream';
import { LogLineReader, type ReadResult } from '../src/infrastructure/process/LogLineReader.js';

const text = (result: ReadResult): string | null => (result.kind === 'line' ? result.bytes.toString('utf8') : null);

describe('LogLineReader', () => {
  test('splits chunks into complete lines', async () => {
    const stdout = new PassThrough();
    const reader = new LogLineReader([stdout]);

    stdout.write('Frame ran');
    stdout.write('ge: 1-3\nBlock 1/4\n');

    expect(text(await reader.readLine(100))).toBe('Frame range: 1-3');
    expect(text(await reader.readLine(100))).toBe('Block 1/4');
  });

  test('times out when no full line is available', async () => {
    const stdout = new PassThrough();
    const reader = new LogLineReader([stdout]);
    stdout.write('partial');

    await expect(reader.readLine(10)).resolves.toEqual({ kind: 'timeout' });
  });

  test('a pending read wakes up when a line arrives', async () => {
    const stdout = new PassThrough();
    const reader = new LogLineReader([stdout]);

    const pending = reader.readLine(1000);
    stdout.write('ROP node endRender\n');

    expect(text(await pending)).toBe('ROP node endRender');
  });

  test('keeps a partial line per stream', async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const reader = new LogLineReader([stdout, stderr]);

    stdout.write('Loading RS ');
    stderr.write('warning: low memory\n');
    stdout.write('rendering options\n');

    const lines = [text(await reader.readLine(100)), text(await reader.readLine(100))];
    expect(lines.sort()).toEqual(['Loading RS rendering options', 'warning: low memory']);
  });

  test('flushes the last unterminated line and then reports closed', async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const reader = new LogLineReader([stdout, stderr]);

    stdout.end('last line');
    stderr.end();

    expect(text(await reader.readLine(100))).toBe('last line');
    await expect(reader.readLine(100)).resolves.toEqual({ kind: 'closed' });
    expect(reader.isClosed).toBe(true);
  });

  test('only one read may wait at a time', async () => {
    const reader = new LogLineReader([new PassThrough()]);
    const first = reader.readLine(10);
    await expect(reader.readLine(10)).rejects.toThrow('LogLineReader supports a single pending read');
    await expect(first).resolves.toEqual({ kind: 'timeout' });
  });
});
