export type CaseTransform =
  | 'camelCase'
  | 'constantCase'
  | 'dotCase'
  | 'headerCase'
  | 'lowerCase'
  | 'pascalCase'
  | 'paramCase'
  | 'pathCase'
  | 'sentenceCase'
  | 'snakeCase'
  | 'titleCase'
  | 'upperCase';

const capitalize = (word: string): string =>
  word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

const lower = (word: string): string => word.toLowerCase();

/**
 * Splits an identifier-ish string into words: on anything that is not a
 * letter or digit, between a lowercase letter or digit and an uppercase one,
 * and before the last capital of an acronym run (`XMLParser` -> `XML Parser`).
 */
export function splitWords(input: string): string[] {
  return input
    .replace(/([\p{Ll}\d])(\p{Lu})/gu, '$1 $2')
    .replace(/(\p{Lu})(\p{Lu}\p{Ll})/gu, '$1 $2')
    .split(/[^\p{L}\d]+/u)
    .filter(Boolean);
}

export function camelCase(input: string): string {
  return splitWords(input)
    .map((word, i) => (i === 0 ? lower(word) : capitalize(word)))
    .join('');
}

export function pascalCase(input: string): string {
  return splitWords(input).map(capitalize).join('');
}

export function constantCase(input: string): string {
  return splitWords(input).map(word => word.toUpperCase()).join('_');
}

export function snakeCase(input: string): string {
  return splitWords(input).map(lower).join('_');
}

export function paramCase(input: string): string {
  return splitWords(input).map(lower).join('-');
}

export function dotCase(input: string): string {
  return splitWords(input).map(lower).join('.');
}

export function pathCase(input: string): string {
  return splitWords(input).map(lower).join('/');
}

export function headerCase(input: string): string {
  return splitWords(input).map(capitalize).join('-');
}

export function titleCase(input: string): string {
  return splitWords(input).map(capitalize).join(' ');
}

export function sentenceCase(input: string): string {
  return splitWords(input)
    .map((word, i) => (i === 0 ? capitalize(word) : lower(word)))
    .join(' ');
}

export function lowerCase(input: string): string {
  return input.toLowerCase();
}

export function upperCase(input: string): string {
  return input.toUpperCase();
}

export const CASE_TRANSFORMS: Readonly<Record<CaseTransform, (input: string) => string>> = {
  camelCase,
  constantCase,
  dotCase,
  headerCase,
  lowerCase,
  pascalCase,
  paramCase,
  pathCase,
  sentenceCase,
  snakeCase,
  titleCase,
  upperCase
};

export function isCaseTransform(name: string): name is CaseTransform {
  return Object.prototype.hasOwnProperty.call(CASE_TRANSFORMS, name);
}
