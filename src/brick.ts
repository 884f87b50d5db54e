import { promises as fs } from 'node:fs';
import { join, relative, sep } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { mapWithLimit } from './concurrency.js';
import { GenerationError, errorMessage } from './errors.js';
import { Generator } from './generator.js';
import { logger } from './logger.js';
import { templateFile, type TemplateFile } from './substitution.js';
import { exists } from './utils.js';
import {
  ErrorCode,
  type BindingValue,
  type BrickManifest,
  type BrickVariable,
  type BrickVariableType
} from './types.js';

export const BRICK_YAML = 'brick.yaml';
export const BRICK_DIR = '__brick__';

/** Caps open file descriptors while reading large template trees. */
const DESCRIPTOR_LIMIT = 32;

const VARIABLE_TYPES: ReadonlySet<string> = new Set(['string', 'number', 'boolean', 'enum', 'array', 'list']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isVariableType(value: unknown): value is BrickVariableType {
  return typeof value === 'string' && VARIABLE_TYPES.has(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isBindingValue(value: unknown): value is BindingValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return true;
  if (Array.isArray(value)) return value.every(item => typeof item === 'string' || (isRecord(item) && Object.values(item).every(isBindingValue)));
  return isRecord(value) && Object.values(value).every(isBindingValue);
}

function invalid(message: string): GenerationError {
  return new GenerationError(`INVALID BRICK: ${message}`, ErrorCode.INVALID_BRICK);
}

function parseVariable(name: string, raw: unknown): BrickVariable {
  if (!isRecord(raw)) throw invalid(`var "${name}" must be a map`);
  const type = raw.type ?? 'string';
  if (!isVariableType(type)) throw invalid(`var "${name}" has unknown type ${JSON.stringify(type)}`);

  const variable: BrickVariable = { type };

  if (typeof raw.description === 'string') variable.description = raw.description;
  if (typeof raw.prompt === 'string') variable.prompt = raw.prompt;
  if (raw.default !== undefined && raw.default !== null) {
    if (!isBindingValue(raw.default)) throw invalid(`var "${name}" has an unsupported default`);
    variable.default = raw.default;
  }
  if (raw.defaults !== undefined) {
    if (!isStringArray(raw.defaults)) throw invalid(`var "${name}" defaults must be a list of strings`);
    variable.defaults = raw.defaults;
  }
  if (raw.values !== undefined) {
    if (!isStringArray(raw.values)) throw invalid(`var "${name}" values must be a list of strings`);
    variable.values = raw.values;
  }
  if ((type === 'enum' || type === 'array') && !variable.values) {
    throw invalid(`var "${name}" of type ${type} needs values`);
  }

  return variable;
}

export function parseManifest(source: string): BrickManifest {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (error) {
    throw new GenerationError(`INVALID BRICK: ${BRICK_YAML} is not valid YAML\n${errorMessage(error)}`, ErrorCode.INVALID_BRICK, { cause: error });
  }

  if (!isRecord(raw)) throw invalid(`${BRICK_YAML} must be a map`);
  if (typeof raw.name !== 'string' || !raw.name.trim()) throw invalid('name is required');

  const vars: Record<string, BrickVariable> = {};
  if (raw.vars !== undefined && raw.vars !== null) {
    if (!isRecord(raw.vars)) throw invalid('vars must be a map');
    for (const [name, value] of Object.entries(raw.vars)) {
      vars[name] = parseVariable(name, value);
    }
  }

  return {
    name: raw.name,
    description: typeof raw.description === 'string' ? raw.description : '',
    version: raw.version === undefined ? '0.0.0' : String(raw.version),
    vars
  };
}

async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];

  async function traverse(currentDir: string): Promise<void> {
    const entries = await fs.readdir(currentDir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);

      if (entry.isDirectory()) {
        await traverse(fullPath);
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  }

  await traverse(dir);
  return files.sort();
}

async function readTemplate(root: string, path: string): Promise<TemplateFile | undefined> {
  try {
    const content = await fs.readFile(path);
    return templateFile(relative(root, path).split(sep).join('/'), content);
  } catch (error) {
    logger.warn('Skipping unreadable template file', { path, error: errorMessage(error) });
    return undefined;
  }
}

export interface Brick {
  manifest: BrickManifest;
  generator: Generator;
}

/** Loads `brick.yaml` and every file under `__brick__/` from a brick directory. */
export async function loadBrick(brickPath: string): Promise<Brick> {
  const manifestPath = join(brickPath, BRICK_YAML);

  if (!await exists(manifestPath)) {
    throw new GenerationError(
      `BRICK NOT FOUND: ${manifestPath}\n` +
      `Action: Point at a directory containing ${BRICK_YAML} and ${BRICK_DIR}/`,
      ErrorCode.BRICK_NOT_FOUND
    );
  }

  return logger.operation(`Loading brick ${brickPath}`, async () => {
    const manifest = parseManifest(await fs.readFile(manifestPath, 'utf-8'));
    const templateRoot = join(brickPath, BRICK_DIR);
    const paths = await exists(templateRoot) ? await listFiles(templateRoot) : [];

    const files = await mapWithLimit(paths, DESCRIPTOR_LIMIT, path => readTemplate(templateRoot, path));
    const generator = new Generator(manifest.name, manifest.description, files, Object.keys(manifest.vars));

    logger.debug('Brick loaded', {
      name: manifest.name,
      files: generator.files.length,
      partials: generator.partials.size
    });

    return { manifest, generator };
  });
}
