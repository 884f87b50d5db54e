import { readFile } from 'node:fs/promises';
import { basename, posix } from 'node:path';
import { toOverwriteRule } from './conflict.js';
import { GenerationError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { runSubstitution, type FileContents, type TemplateFile } from './substitution.js';
import type { GeneratorTarget } from './target.js';
import { isFile } from './utils.js';
import {
  ErrorCode,
  type Bindings,
  type FileConflictResolution,
  type GeneratedFile,
  type GeneratorHooks,
  type OverwriteRule
} from './types.js';

const PARTIAL_PATTERN = /\{\{~\s(.+)\s\}\}/;
const FILE_PATTERN = /\{\{%\s?([a-zA-Z]+)\s?%\}\}/;
const ROOT_PATTERN = /^(?:\w:\\|\w:\/|\/|\\)/;
const SEPARATOR_PATTERN = /\/|\\/;

export interface GenerateOptions {
  vars?: Bindings;
  fileConflictResolution?: FileConflictResolution;
  hooks?: GeneratorHooks;
}

/**
 * Keeps an expanded path only when it is non-empty, has no empty segment and
 * is rooted exactly when its template path was.
 */
export function isWritablePath(templatePath: string, expandedPath: string): boolean {
  if (expandedPath.length === 0) return false;
  if (ROOT_PATTERN.test(templatePath) !== ROOT_PATTERN.test(expandedPath)) return false;
  return !expandedPath.split(SEPARATOR_PATTERN).includes('');
}

async function fetchContents(source: string): Promise<FileContents> {
  if (await isFile(source)) {
    try {
      return { path: basename(source), content: await readFile(source) };
    } catch (error) {
      throw new GenerationError(`Failed to read ${source}: ${errorMessage(error)}`, ErrorCode.FETCH_FAILED, { cause: error });
    }
  }

  let url: URL;
  try {
    url = new URL(source);
  } catch (error) {
    throw new GenerationError(`Not a file or URL: ${source}`, ErrorCode.FETCH_FAILED, { cause: error });
  }

  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new GenerationError(`Failed to fetch ${source}: ${errorMessage(error)}`, ErrorCode.FETCH_FAILED, { cause: error });
  }

  if (!response.ok) {
    throw new GenerationError(`Failed to fetch ${source}: HTTP ${response.status}`, ErrorCode.FETCH_FAILED);
  }

  return { path: posix.basename(url.pathname), content: new Uint8Array(await response.arrayBuffer()) };
}

export class Generator {
  readonly files: TemplateFile[] = [];

  /** Partial path (e.g. `{{~ header.md }}`) to its content. */
  readonly partials = new Map<string, Uint8Array>();

  constructor(
    readonly id: string,
    readonly description: string,
    files: ReadonlyArray<TemplateFile | undefined> = [],
    readonly vars: readonly string[] = []
  ) {
    for (const file of files) {
      this.addTemplateFile(file);
    }
  }

  addTemplateFile(file: TemplateFile | undefined): void {
    if (!file) return;
    if (PARTIAL_PATTERN.test(file.path)) {
      this.partials.set(file.path, file.content);
    } else {
      this.files.push(file);
    }
  }

  async generate(target: GeneratorTarget, options: GenerateOptions = {}): Promise<GeneratedFile[]> {
    const overwriteRule = options.fileConflictResolution
      ? toOverwriteRule(options.fileConflictResolution)
      : undefined;

    let vars: Bindings = { ...options.vars };
    const replaced = await options.hooks?.preGen?.(vars);
    if (replaced) vars = replaced;

    const generatedFiles: GeneratedFile[] = [];

    try {
      await this.generateInto(target, vars, overwriteRule, generatedFiles);
    } catch (error) {
      const failure = error instanceof GenerationError
        ? error
        : new GenerationError(`Generation aborted: ${errorMessage(error)}`, ErrorCode.UNKNOWN_ERROR, { cause: error });
      failure.generatedFiles = [...generatedFiles];
      throw failure;
    }

    await options.hooks?.postGen?.(generatedFiles);
    return generatedFiles;
  }

  private async generateInto(
    target: GeneratorTarget,
    vars: Bindings,
    overwriteRule: OverwriteRule | undefined,
    generatedFiles: GeneratedFile[]
  ): Promise<void> {
    for (const file of this.files) {
      const fileMatch = FILE_PATTERN.exec(file.path);

      if (fileMatch) {
        const key = fileMatch[1] ?? '';
        const source = vars[key];
        if (typeof source !== 'string') {
          throw new GenerationError(`Variable "${key}" must be a path or URL to fetch ${file.path}`, ErrorCode.FETCH_FAILED);
        }

        const result = await fetchContents(source);
        if (!result.path) {
          logger.debug('Fetched file has no name, skipping', { source });
          continue;
        }
        generatedFiles.push(await target.createFile(result.path, result.content, overwriteRule));
        continue;
      }

      for (const result of runSubstitution(file, vars, this.partials)) {
        if (!isWritablePath(file.path, result.path)) {
          logger.debug('Discarding expanded path', { template: file.path, path: result.path });
          continue;
        }
        generatedFiles.push(await target.createFile(result.path, result.content, overwriteRule));
      }
    }
  }

  compareTo(other: Generator): number {
    const a = this.id.toLowerCase();
    const b = other.id.toLowerCase();
    return a < b ? -1 : a > b ? 1 : 0;
  }

  toString(): string {
    return `[${this.id}: ${this.description}]`;
  }
}
