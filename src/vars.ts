import { GenerationError } from './errors.js';
import {
  ErrorCode,
  type BindingValue,
  type Bindings,
  type BrickVariable,
  type Prompter
} from './types.js';

const TRUE_WORDS = new Set(['true', 'yes', 'y']);
const FALSE_WORDS = new Set(['false', 'no', 'n']);

function invalid(name: string, message: string): GenerationError {
  return new GenerationError(`INVALID VARIABLE: ${name} ${message}`, ErrorCode.INVALID_VARIABLE);
}

function splitList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

function toStringList(name: string, value: BindingValue): string[] {
  if (typeof value === 'string') return splitList(value);
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) return [...value];
  throw invalid(name, 'must be a list of strings');
}

/** Coerces a value to the declared variable type. */
export function coerceVariable(name: string, variable: BrickVariable, value: BindingValue): BindingValue {
  switch (variable.type) {
    case 'string':
      if (typeof value === 'string') return value;
      if (typeof value === 'number' || typeof value === 'boolean') return String(value);
      throw invalid(name, 'must be a string');

    case 'number': {
      if (typeof value === 'number' && Number.isFinite(value)) return value;
      if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
      throw invalid(name, `must be a number, got ${JSON.stringify(value)}`);
    }

    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (typeof value === 'string') {
        const word = value.trim().toLowerCase();
        if (TRUE_WORDS.has(word)) return true;
        if (FALSE_WORDS.has(word)) return false;
      }
      throw invalid(name, `must be a boolean, got ${JSON.stringify(value)}`);

    case 'enum': {
      const choice = typeof value === 'string' ? value.trim() : value;
      if (typeof choice === 'string' && variable.values?.includes(choice)) return choice;
      throw invalid(name, `must be one of ${(variable.values ?? []).join(', ')}`);
    }

    case 'array': {
      const items = toStringList(name, value);
      const unknown = items.filter(item => !variable.values?.includes(item));
      if (unknown.length > 0) {
        throw invalid(name, `has unknown values ${unknown.join(', ')}; allowed: ${(variable.values ?? []).join(', ')}`);
      }
      return items;
    }

    case 'list':
      return toStringList(name, value);
  }
}

function defaultFor(variable: BrickVariable): BindingValue | undefined {
  if (variable.type === 'array' && variable.defaults) return variable.defaults;
  return variable.default ?? variable.defaults;
}

/**
 * Resolves the brick's declared variables: provided value, then default,
 * then the prompter. Undeclared provided variables pass through untouched.
 */
export async function resolveVars(
  declared: Readonly<Record<string, BrickVariable>>,
  provided: Bindings,
  prompter?: Prompter
): Promise<Bindings> {
  const resolved: Bindings = { ...provided };

  for (const [name, variable] of Object.entries(declared)) {
    let value = provided[name] ?? defaultFor(variable);

    if (value === undefined && prompter) {
      const hint = variable.values ? ` (${variable.values.join('/')})` : '';
      value = await prompter.prompt(`${variable.prompt ?? name}${hint}`);
    }

    if (value === undefined) {
      throw invalid(name, 'is required\nAction: Pass it as --' + name + ' <value> or give it a default');
    }

    resolved[name] = coerceVariable(name, variable, value);
  }

  return resolved;
}
