import * as path from 'path';
import { readOutputFile } from '../io/files.js';
import { FIELD_NAMES, parseOutput, runParser, type FieldName } from '../parsers/dispatch.js';
import { parseMeciDir } from '../parsers/meci.js';

interface ParseArgs {
  file?: string;
  meciDir?: string;
  field?: FieldName;
  compact: boolean;
}

function isFieldName(value: string): value is FieldName {
  return (FIELD_NAMES as readonly string[]).includes(value);
}

function parseArgs(argv: string[]): ParseArgs {
  const out: ParseArgs = { compact: false };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';
    if (arg === '--meci-dir') out.meciDir = argv[++index];
    else if (arg === '--field') {
      const field = argv[++index] ?? '';
      if (!isFieldName(field)) throw new Error(`Unknown field: ${field}`);
      out.field = field;
    } else if (arg === '--compact') out.compact = true;
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else if (arg.startsWith('-')) throw new Error(`Unknown arg: ${arg}`);
    else if (out.file === undefined) out.file = arg;
    else throw new Error(`Unexpected argument: ${arg}`);
  }
  return out;
}

function usage(): string {
  return [
    'Usage:',
    '  tc-parse-mcp parse <tc.out> [--field <name>] [--compact]',
    '  tc-parse-mcp parse --meci-dir <dir> [--compact]',
    `  fields: ${FIELD_NAMES.join(', ')}`,
  ].join('\n');
}

/** Parse one output file (or MECI directory) and print the result as JSON on stdout. */
export async function runParseCli(argv: string[]): Promise<void> {
  let args: ParseArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === 'help') {
      console.error(usage());
      return;
    }
    throw new Error(`${message}\n${usage()}`);
  }

  let result: unknown;
  if (args.meciDir !== undefined) {
    const directory = path.resolve(args.meciDir);
    result = parseMeciDir(directory);
    console.error(`[tc-parse-mcp] Parsed MECI directory ${directory}`);
  } else if (args.file !== undefined) {
    const file = path.resolve(args.file);
    const text = readOutputFile(file);
    result = args.field !== undefined ? runParser(args.field, text) : parseOutput(text);
    console.error(`[tc-parse-mcp] Parsed ${file}`);
  } else {
    throw new Error(`No output file or --meci-dir given.\n${usage()}`);
  }

  process.stdout.write(`${JSON.stringify(result, null, args.compact ? undefined : 2)}\n`);
}
