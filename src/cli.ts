/**
 * Command-line front end.
 *
 * Usage:
 *   huffpack compress <input> <output>
 *   huffpack decompress <input> <output>
 *   huffpack inspect <input>
 *
 * Options:
 *   -q, --quiet   Only print errors
 *   -h, --help    Show usage
 */

import * as fs from 'fs';
import { HuffmanCompressor } from './compressor.js';
import { IOError } from './errors.js';

export const USAGE = `Usage:
  huffpack compress <input> <output>
  huffpack decompress <input> <output>
  huffpack inspect <input>

Options:
  -q, --quiet   Only print errors
  -h, --help    Show usage`;

/**
 * Where the CLI writes its messages.
 */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

type Command = 'compress' | 'decompress' | 'inspect';

type Options =
  | { command: 'compress' | 'decompress'; input: string; output: string; quiet: boolean }
  | { command: 'inspect'; input: string; quiet: boolean };

function isCommand(value: string): value is Command {
  return value === 'compress' || value === 'decompress' || value === 'inspect';
}

/**
 * Parse arguments; returns an error message on bad usage, or null for --help.
 */
function parseArgs(args: string[]): Options | string | null {
  const positional: string[] = [];
  let quiet = false;

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      return null;
    } else if (arg === '--quiet' || arg === '-q') {
      quiet = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      return `Unknown option: ${arg}`;
    } else {
      positional.push(arg);
    }
  }

  const [command, input, output] = positional;
  if (command === undefined) {
    return 'Missing command';
  }
  if (!isCommand(command)) {
    return `Unknown command: ${command}`;
  }

  const expected = command === 'inspect' ? 2 : 3;
  if (positional.length !== expected || input === undefined) {
    return `${command} expects ${expected - 1} path argument(s)`;
  }

  if (command === 'inspect') {
    return { command, input, quiet };
  }
  if (output === undefined) {
    return `${command} expects 2 path argument(s)`;
  }
  return { command, input, output, quiet };
}

function readInput(path: string): Uint8Array {
  try {
    return fs.readFileSync(path);
  } catch (err) {
    throw new IOError(path, err);
  }
}

function writeOutput(path: string, data: Uint8Array): void {
  try {
    fs.writeFileSync(path, data);
  } catch (err) {
    throw new IOError(path, err);
  }
}

function formatSymbol(symbol: number): string {
  const hex = `0x${symbol.toString(16).padStart(2, '0')}`;
  const printable = symbol >= 0x21 && symbol <= 0x7e;
  return printable ? `${hex} '${String.fromCharCode(symbol)}'` : hex;
}

function execute(options: Options, out: CliOutput): void {
  const compressor = new HuffmanCompressor();
  const data = readInput(options.input);

  if (options.command === 'compress') {
    const result = compressor.compress(data);
    writeOutput(options.output, result.data);

    if (!options.quiet) {
      out.log('Compression results:');
      out.log(`  Original size:   ${result.originalSize} bytes`);
      out.log(`  Compressed size: ${result.compressedSize} bytes`);
      out.log(`  Compression ratio: ${result.compressionRatio.toFixed(2)}x`);
      out.log(`  Distinct symbols: ${result.symbolCount}`);
    }
  } else if (options.command === 'decompress') {
    // Decode fully before touching the output file.
    const bytes = compressor.decompress(data);
    writeOutput(options.output, bytes);

    if (!options.quiet) {
      out.log(`Decompressed ${data.length} bytes to ${bytes.length} bytes`);
    }
  } else {
    const info = compressor.inspect(data);
    out.log(`Format version:  ${info.version}`);
    out.log(`Original length: ${info.originalLength} bytes`);
    out.log(`Payload length:  ${info.payloadLength} bytes`);
    out.log(`Padding bits:    ${info.paddingBits}`);
    out.log(`Symbols:         ${info.symbolCount}`);

    const symbols = [...info.codeTable.keys()].sort((a, b) => a - b);
    for (const symbol of symbols) {
      const code = info.codeTable.get(symbol);
      if (code !== undefined) {
        out.log(`  ${formatSymbol(symbol)}  ${code.bits}`);
      }
    }
  }
}

/**
 * Run the CLI and return its exit code.
 */
export function run(args: string[], out: CliOutput = consoleOutput): number {
  const options = parseArgs(args);

  if (options === null) {
    out.log(USAGE);
    return 0;
  }
  if (typeof options === 'string') {
    out.error(options);
    out.error(USAGE);
    return 2;
  }

  try {
    execute(options, out);
    return 0;
  } catch (err) {
    const name = err instanceof Error ? err.name : 'Error';
    const message = err instanceof Error ? err.message : String(err);
    out.error(`Error [${name}]: ${message}`);
    return 1;
  }
}
