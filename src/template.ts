import { CASE_TRANSFORMS, isCaseTransform, type CaseTransform } from './case.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { BindingValue, Bindings, Partials } from './types.js';

type Node =
  | { kind: 'text'; value: string }
  | { kind: 'variable'; path: string }
  | { kind: 'transform'; transform: CaseTransform; path: string }
  | { kind: 'partial'; name: string }
  | { kind: 'section'; name: string; inverted: boolean; children: Node[] };

interface Scope {
  vars: Bindings;
  current?: BindingValue;
}

export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RenderError';
  }
}

const MAX_PARTIAL_DEPTH = 32;

const DELIMITER_PATTERN = /\{\{[\s\S]*?\}\}/;
const TAG_PATTERN = /\{\{\{([\s\S]*?)\}\}\}|\{\{([\s\S]*?)\}\}/g;
const PATH_PATTERN = /^(?:\.|[\w$-]+(?:\.[\w$-]+)*)$/;
const PREFIX_TRANSFORM_PATTERN = /^(\w+)\s+(\S+)$/;
const POSTFIX_TRANSFORM_PATTERN = /^(\S+)\.(\w+)\(\)$/;
const PARTIAL_PATTERN = /^~\s*(.+?)\s*$/s;
const STANDALONE_TAG_PATTERN = /^[#^/!]/;

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const encoder = new TextEncoder();

function parseTag(raw: string, inner: string, triple: boolean): Node | undefined {
  const body = inner.trim();

  if (triple) {
    return PATH_PATTERN.test(body) ? { kind: 'variable', path: body } : { kind: 'text', value: raw };
  }

  if (body.startsWith('!')) return undefined;

  const [, partialName] = PARTIAL_PATTERN.exec(body) ?? [];
  if (partialName) return { kind: 'partial', name: partialName };

  const [, prefixName = '', prefixPath = ''] = PREFIX_TRANSFORM_PATTERN.exec(body) ?? [];
  if (isCaseTransform(prefixName) && PATH_PATTERN.test(prefixPath)) {
    return { kind: 'transform', transform: prefixName, path: prefixPath };
  }

  const [, postfixPath = '', postfixName = ''] = POSTFIX_TRANSFORM_PATTERN.exec(body) ?? [];
  if (isCaseTransform(postfixName) && PATH_PATTERN.test(postfixPath)) {
    return { kind: 'transform', transform: postfixName, path: postfixPath };
  }

  if (PATH_PATTERN.test(body)) return { kind: 'variable', path: body };

  // Not markup this language understands (e.g. `style={{ color: 'red' }}`).
  return { kind: 'text', value: raw };
}

/**
 * Length of the line ending to drop when a section or comment tag is the only
 * thing on its line, or undefined when the tag shares its line.
 */
function standaloneTrailing(template: string, cursor: number, index: number, end: number): number | undefined {
  const lineStart = template.lastIndexOf('\n', index - 1) + 1;
  if (lineStart < cursor || !/^[ \t]*$/.test(template.slice(lineStart, index))) return undefined;

  const after = /^[ \t]*(?:\r?\n|$)/.exec(template.slice(end));
  return after ? after[0].length : undefined;
}

/** Parses a template into a node tree. Throws RenderError on unbalanced sections. */
export function parse(template: string): Node[] {
  const root: Node[] = [];
  const stack: { name: string; children: Node[] }[] = [{ name: '', children: root }];
  const top = () => stack[stack.length - 1] ?? { name: '', children: root };
  let cursor = 0;

  for (const match of template.matchAll(TAG_PATTERN)) {
    const index = match.index ?? 0;
    const end = index + match[0].length;

    const triple = match[1] !== undefined;
    const inner = (triple ? match[1] : match[2]) ?? '';
    const body = inner.trim();

    const trailing = !triple && STANDALONE_TAG_PATTERN.test(body)
      ? standaloneTrailing(template, cursor, index, end)
      : undefined;
    const textEnd = trailing === undefined ? index : template.lastIndexOf('\n', index - 1) + 1;

    if (textEnd > cursor) {
      top().children.push({ kind: 'text', value: template.slice(cursor, textEnd) });
    }
    cursor = end + (trailing ?? 0);

    if (!triple && (body.startsWith('#') || body.startsWith('^'))) {
      const name = body.slice(1).trim();
      const children: Node[] = [];
      top().children.push({ kind: 'section', name, inverted: body.startsWith('^'), children });
      stack.push({ name, children });
      continue;
    }

    if (!triple && body.startsWith('/')) {
      const name = body.slice(1).trim();
      if (stack.length === 1 || top().name !== name) {
        throw new RenderError(`Unexpected closing tag {{/${name}}}`);
      }
      stack.pop();
      continue;
    }

    const node = parseTag(match[0], inner, triple);
    if (node) top().children.push(node);
  }

  if (cursor < template.length) {
    top().children.push({ kind: 'text', value: template.slice(cursor) });
  }

  if (stack.length > 1) {
    throw new RenderError(`Unclosed section {{#${top().name}}}`);
  }

  return root;
}

function isBindings(value: BindingValue | undefined): value is Bindings {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isList(value: BindingValue | undefined): value is ReadonlyArray<string | Bindings> {
  return Array.isArray(value);
}

export function lookup(path: string, scope: Scope): BindingValue | undefined {
  if (path === '.') return scope.current;

  const [head = '', ...rest] = path.split('.');
  let value: BindingValue | undefined = scope.vars[head];

  for (const segment of rest) {
    if (!isBindings(value)) return undefined;
    value = value[segment];
  }

  return value;
}

function stringify(value: BindingValue | undefined): string {
  switch (typeof value) {
    case 'string': return value;
    case 'number':
    case 'boolean': return String(value);
    default: return '';
  }
}

function isFalsy(value: BindingValue | undefined): boolean {
  return value === undefined || value === false || value === '' || (isList(value) && value.length === 0);
}

function resolvePartial(name: string, partials: Partials): Uint8Array | undefined {
  const key = `{{~ ${name} }}`;
  const exact = partials.get(key);
  if (exact) return exact;

  for (const [path, content] of partials) {
    if (path.split(/[\\/]/).pop() === key) return content;
  }
  return undefined;
}

function evaluate(nodes: Node[], scope: Scope, partials: Partials, depth: number): string {
  let out = '';

  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        out += node.value;
        break;

      case 'variable':
        out += stringify(lookup(node.path, scope));
        break;

      case 'transform':
        out += CASE_TRANSFORMS[node.transform](stringify(lookup(node.path, scope)));
        break;

      case 'partial': {
        const content = resolvePartial(node.name, partials);
        if (!content) break;
        if (depth >= MAX_PARTIAL_DEPTH) {
          throw new RenderError(`Partial nesting exceeded ${MAX_PARTIAL_DEPTH} levels at {{~ ${node.name} }}`);
        }
        out += evaluate(parse(decoder.decode(content)), scope, partials, depth + 1);
        break;
      }

      case 'section': {
        const value = lookup(node.name, scope);

        if (node.inverted) {
          if (isFalsy(value)) out += evaluate(node.children, scope, partials, depth);
          break;
        }

        // {{#snakeCase}}...{{/snakeCase}} applies the transform to the rendered body.
        if (value === undefined && isCaseTransform(node.name)) {
          out += CASE_TRANSFORMS[node.name](evaluate(node.children, scope, partials, depth));
          break;
        }

        if (!isList(value)) break;

        for (const element of value) {
          const vars = isBindings(element) ? { ...scope.vars, ...element } : scope.vars;
          out += evaluate(node.children, { vars, current: element }, partials, depth);
        }
        break;
      }
    }
  }

  return out;
}

/** Strict render: throws RenderError on malformed markup. */
export function renderTemplate(template: string, bindings: Bindings, partials: Partials = new Map()): string {
  return evaluate(parse(template), { vars: bindings }, partials, 0);
}

/** Best-effort string render. Malformed markup yields the template unchanged. */
export function renderString(template: string, bindings: Bindings, partials: Partials = new Map()): string {
  if (!DELIMITER_PATTERN.test(template)) return template;

  try {
    return renderTemplate(template, bindings, partials);
  } catch (error) {
    logger.debug('Template left unrendered', { error: errorMessage(error) });
    return template;
  }
}

/**
 * Renders template bytes. Anything that cannot be decoded or rendered comes
 * back as the very same array, as does content without a `{{` delimiter.
 */
export function render(content: Uint8Array, bindings: Bindings, partials: Partials = new Map()): Uint8Array {
  try {
    const decoded = decoder.decode(content);
    if (!DELIMITER_PATTERN.test(decoded)) return content;
    return encoder.encode(renderTemplate(decoded, bindings, partials));
  } catch (error) {
    logger.debug('Content left unrendered', { error: errorMessage(error) });
    return content;
  }
}
