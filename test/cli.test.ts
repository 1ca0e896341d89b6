import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { run, USAGE, type CliOutput } from '../src/cli.js';

interface CapturedOutput extends CliOutput {
  logs: string[];
  errors: string[];
}

function captureOutput(): CapturedOutput {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    log: (message) => logs.push(message),
    error: (message) => errors.push(message),
  };
}

describe('CLI', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'huffpack-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should compress and decompress files', () => {
    const input = path.join(dir, 'input.txt');
    const packed = path.join(dir, 'input.huf');
    const restored = path.join(dir, 'restored.txt');
    fs.writeFileSync(input, 'aaaabbbcc');

    const out = captureOutput();
    expect(run(['compress', input, packed], out)).toBe(0);
    expect(run(['decompress', packed, restored], out)).toBe(0);

    expect(fs.readFileSync(packed).length).toBe(33);
    expect(fs.readFileSync(restored, 'utf8')).toBe('aaaabbbcc');
    expect(out.errors).toEqual([]);
    expect(out.logs).toEqual([
      'Compression results:',
      '  Original size:   9 bytes',
      '  Compressed size: 33 bytes',
      '  Compression ratio: 0.27x',
      '  Distinct symbols: 3',
      'Decompressed 33 bytes to 9 bytes',
    ]);
  });

  it('should print nothing with --quiet', () => {
    const input = path.join(dir, 'input.bin');
    fs.writeFileSync(input, new Uint8Array(1000).fill(0x41));

    const out = captureOutput();
    expect(run(['-q', 'compress', input, path.join(dir, 'out.huf')], out)).toBe(0);

    expect(out.logs).toEqual([]);
    expect(fs.readFileSync(path.join(dir, 'out.huf')).length).toBe(146);
  });

  it('should compress an empty file', () => {
    const input = path.join(dir, 'empty');
    const packed = path.join(dir, 'empty.huf');
    const restored = path.join(dir, 'empty.out');
    fs.writeFileSync(input, '');

    const out = captureOutput();
    expect(run(['compress', '--quiet', input, packed], out)).toBe(0);
    expect(run(['decompress', '--quiet', packed, restored], out)).toBe(0);

    expect(fs.readFileSync(packed).length).toBe(16);
    expect(fs.readFileSync(restored).length).toBe(0);
  });

  it('should inspect a container', () => {
    const input = path.join(dir, 'input.txt');
    const packed = path.join(dir, 'input.huf');
    fs.writeFileSync(input, 'aaaabbbcc');
    run(['compress', '-q', input, packed], captureOutput());

    const out = captureOutput();
    expect(run(['inspect', packed], out)).toBe(0);

    expect(out.logs).toEqual([
      'Format version:  1',
      'Original length: 9 bytes',
      'Payload length:  2 bytes',
      'Padding bits:    2',
      'Symbols:         3',
      "  0x61 'a'  0",
      "  0x62 'b'  11",
      "  0x63 'c'  10",
    ]);
  });

  it('should report a missing input file as IOError', () => {
    const out = captureOutput();
    const missing = path.join(dir, 'missing.bin');

    expect(run(['compress', missing, path.join(dir, 'out.huf')], out)).toBe(1);

    expect(out.errors).toHaveLength(1);
    expect(out.errors[0]).toMatch(/^Error \[IOError\]: .*missing\.bin: ENOENT/);
  });

  it('should report a malformed container and write no output', () => {
    const input = path.join(dir, 'broken.huf');
    const output = path.join(dir, 'broken.out');
    fs.writeFileSync(input, new Uint8Array([0x48, 0x55, 0x46]));

    const out = captureOutput();
    expect(run(['decompress', input, output], out)).toBe(1);

    expect(out.errors).toEqual([
      'Error [MalformedHeaderError]: Invalid header: expected at least 16 bytes, got 3',
    ]);
    expect(fs.existsSync(output)).toBe(false);
  });

  it('should print usage for --help', () => {
    const out = captureOutput();

    expect(run(['--help'], out)).toBe(0);
    expect(out.logs).toEqual([USAGE]);
  });

  it('should exit with 2 on bad usage', () => {
    const cases: Array<[string[], string]> = [
      [[], 'Missing command'],
      [['frobnicate', 'a', 'b'], 'Unknown command: frobnicate'],
      [['compress', 'only-input'], 'compress expects 2 path argument(s)'],
      [['inspect', 'a', 'b'], 'inspect expects 1 path argument(s)'],
      [['--verbose', 'compress', 'a', 'b'], 'Unknown option: --verbose'],
    ];

    for (const [args, message] of cases) {
      const out = captureOutput();
      expect(run(args, out)).toBe(2);
      expect(out.errors).toEqual([message, USAGE]);
    }
  });
});
