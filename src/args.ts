import { GenerationError } from './errors.js';
import { ErrorCode, type BindingValue, type Bindings, type FileConflictResolution } from './types.js';

export interface MakeArgs {
  command: 'make';
  brick: string;
  outputDir: string | undefined;
  onConflict: FileConflictResolution | undefined;
  vars: Bindings;
  verbose: boolean;
  quiet: boolean;
}

const CONFLICT_RESOLUTIONS: readonly FileConflictResolution[] = ['prompt', 'overwrite', 'skip', 'append'];

function isConflictResolution(value: string): value is FileConflictResolution {
  return CONFLICT_RESOLUTIONS.some(resolution => resolution === value);
}

function isBindingValue(value: unknown): value is BindingValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return true;
  if (typeof value !== 'object' || value === null) return false;
  if (Array.isArray(value)) {
    return value.every(item => typeof item === 'string' || (typeof item === 'object' && item !== null && !Array.isArray(item) && isBindingValue(item)));
  }
  return Object.values(value).every(isBindingValue);
}

function badArgs(message: string): GenerationError {
  return new GenerationError(message, ErrorCode.INVALID_ARGUMENTS);
}

/** Values that look like JSON arrays or objects are decoded; everything else stays a string. */
export function parseVarValue(name: string, raw: string): BindingValue {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('[') && !trimmed.startsWith('{')) return raw;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    throw badArgs(`Invalid JSON for --${name}: ${raw}`);
  }
  if (!isBindingValue(parsed)) throw badArgs(`Unsupported value for --${name}: ${raw}`);
  return parsed;
}

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  '-o', '--output-dir', '--on-conflict', '--verbose', '--quiet', '-h', '--help', '-v', '--version'
]);

/** Takes the next argument as the value of `flag`; negative numbers and other dash values pass. */
function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || KNOWN_FLAGS.has(value)) throw badArgs(`Missing value for ${flag}`);
  return value;
}

export function parseArgs(args: string[]): MakeArgs {
  const [command, ...rest] = args;
  if (command !== 'make') throw badArgs(`Unknown command: ${command ?? '(none)'}`);

  let brick: string | undefined;
  let outputDir: string | undefined;
  let onConflict: FileConflictResolution | undefined;
  let verbose = false;
  let quiet = false;
  const vars: Bindings = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? '';

    if (arg === '-o' || arg === '--output-dir') {
      outputDir = takeValue(rest, i++, arg);
    } else if (arg === '--on-conflict') {
      const value = takeValue(rest, i++, arg);
      if (!isConflictResolution(value)) {
        throw badArgs(`Invalid --on-conflict: ${value} (expected ${CONFLICT_RESOLUTIONS.join('|')})`);
      }
      onConflict = value;
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (arg === '--quiet') {
      quiet = true;
    } else if (arg.startsWith('--')) {
      const [name = '', inline] = arg.slice(2).split(/=(.*)/s);
      if (!name) throw badArgs(`Invalid flag: ${arg}`);
      const value = inline ?? takeValue(rest, i++, arg);
      vars[name] = parseVarValue(name, value);
    } else if (arg.startsWith('-')) {
      throw badArgs(`Unknown flag: ${arg}`);
    } else if (!brick) {
      brick = arg;
    } else {
      throw badArgs(`Unexpected argument: ${arg}`);
    }
  }

  if (!brick) throw badArgs('Missing brick directory');

  return { command: 'make', brick, outputDir, onConflict, vars, verbose, quiet };
}
