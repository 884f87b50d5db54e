export type BindingScalar = string | number | boolean;

export interface Bindings {
  [key: string]: BindingValue;
}

export type BindingValue = BindingScalar | Bindings | ReadonlyArray<string | Bindings>;

export type Partials = ReadonlyMap<string, Uint8Array>;

export enum ErrorCode {
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  FETCH_FAILED = 'FETCH_FAILED',
  PROMPT_UNAVAILABLE = 'PROMPT_UNAVAILABLE',
  FILE_WRITE_FAILED = 'FILE_WRITE_FAILED',
  BRICK_NOT_FOUND = 'BRICK_NOT_FOUND',
  INVALID_BRICK = 'INVALID_BRICK',
  INVALID_VARIABLE = 'INVALID_VARIABLE',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS'
}

export type GeneratedFileStatus = 'created' | 'overwritten' | 'appended' | 'skipped' | 'identical';

export interface GeneratedFile {
  path: string;
  status: GeneratedFileStatus;
}

export type FileConflictResolution = 'prompt' | 'overwrite' | 'skip' | 'append';

export type OverwriteRule =
  | 'alwaysOverwrite'
  | 'alwaysSkip'
  | 'alwaysAppend'
  | 'overwriteOnce'
  | 'skipOnce'
  | 'appendOnce';

/**
 * Something that can ask the user a question. The CLI wires a terminal
 * implementation; library callers may pass their own or none at all.
 */
export interface Prompter {
  prompt(question: string): Promise<string>;
}

export interface GeneratorHooks {
  /** Runs before rendering. A returned map replaces the variables. */
  preGen?: (vars: Bindings) => Promise<Bindings | void> | Bindings | void;
  postGen?: (files: readonly GeneratedFile[]) => Promise<void> | void;
}

export type BrickVariableType = 'string' | 'number' | 'boolean' | 'enum' | 'array' | 'list';

export interface BrickVariable {
  type: BrickVariableType;
  description?: string;
  default?: BindingValue;
  defaults?: string[];
  prompt?: string;
  values?: string[];
}

export interface BrickManifest {
  name: string;
  description: string;
  version: string;
  vars: Record<string, BrickVariable>;
}
