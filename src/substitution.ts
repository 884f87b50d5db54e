import { render, renderString } from './template.js';
import type { BindingValue, Bindings, Partials } from './types.js';

export interface TemplateFile {
  readonly path: string;
  readonly content: Uint8Array;
}

export interface FileContents {
  readonly path: string;
  readonly content: Uint8Array;
}

const encoder = new TextEncoder();

export function templateFile(path: string, content: string | Uint8Array): TemplateFile {
  return { path, content: typeof content === 'string' ? encoder.encode(content) : content };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const LOOP_KEY_PATTERN = /\{\{#(.*?)\}\}/g;

function loopPattern(name: string): RegExp {
  const key = escapeRegExp(name);
  return new RegExp(`\\{\\{#${key}\\}\\}(.*?)\\{\\{\\{(.*?)\\}\\}\\}(.*?)\\{\\{/${key}\\}\\}`);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function fileContentsEqual(a: FileContents, b: FileContents): boolean {
  return a.path === b.path && bytesEqual(a.content, b.content);
}

/**
 * Cartesian product of `lists`, yielded in odometer order (last list varies
 * fastest). Zero lists yield a single empty tuple; any empty list yields none.
 */
export function* permutations<T>(lists: ReadonlyArray<ReadonlyArray<T>>): Generator<T[]> {
  if (lists.some(list => list.length === 0)) return;

  const counters = new Array<number>(lists.length).fill(0);

  while (true) {
    const tuple: T[] = [];
    for (const [i, list] of lists.entries()) {
      const item = list[counters[i] ?? 0];
      if (item !== undefined) tuple.push(item);
    }
    yield tuple;

    let position = lists.length - 1;
    while (position >= 0) {
      const next = (counters[position] ?? 0) + 1;
      if (next < (lists[position]?.length ?? 0)) {
        counters[position] = next;
        break;
      }
      counters[position] = 0;
      position--;
    }
    if (position < 0) return;
  }
}

function isList(value: BindingValue | undefined): value is ReadonlyArray<string | Bindings> {
  return Array.isArray(value);
}

/**
 * Rewrites every loop section in `path` whose binding is a list into a plain
 * substitution, keeping the text around the value token. Returns the
 * rewritten path and the list keys it now depends on.
 */
export function rewritePathLoops(path: string, bindings: Bindings): { path: string; keys: string[] } {
  let filePath = path;
  const keys: string[] = [];

  for (const match of path.matchAll(LOOP_KEY_PATTERN)) {
    const key = match[1];
    if (!key || keys.includes(key) || !isList(bindings[key])) continue;

    const pattern = loopPattern(key);
    let loop = pattern.exec(filePath);
    if (!loop) continue;

    while (loop) {
      const [section, before = '', value = '', after = ''] = loop;
      const token = value.trim() === '.' ? `{{${key}}}` : `{{${key}.${value.trim()}}}`;
      filePath = filePath.replace(section, () => `${before}${token}${after}`);
      loop = pattern.exec(filePath);
    }
    keys.push(key);
  }

  return { path: filePath, keys };
}

function addUnique(set: FileContents[], file: FileContents): void {
  if (!set.some(existing => fileContentsEqual(existing, file))) set.push(file);
}

/**
 * Expands a template into the files it produces. Loop sections in the path
 * fan out over the Cartesian product of the list bindings they reference;
 * each combination renders the path and the content with one element per
 * list overlaid on the bindings. Duplicate (path, content) pairs collapse.
 */
export function runSubstitution(
  file: TemplateFile,
  bindings: Bindings,
  partials: Partials
): FileContents[] {
  const normalized = file.path.replace(/\\/g, '/');
  const { path, keys } = rewritePathLoops(normalized, bindings);

  if (keys.length === 0) {
    return [{ path: renderString(normalized, bindings, partials), content: render(file.content, bindings, partials) }];
  }

  const lists = keys.map(key => {
    const value = bindings[key];
    return isList(value) ? value : [];
  });

  const results: FileContents[] = [];
  for (const tuple of permutations(lists)) {
    const overlay: Bindings = { ...bindings };
    tuple.forEach((element, i) => {
      const key = keys[i];
      if (key !== undefined) overlay[key] = element;
    });

    addUnique(results, {
      path: renderString(path, overlay, partials),
      content: render(file.content, overlay, partials)
    });
  }

  return results;
}
