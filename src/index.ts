export { loadBrick, parseManifest, BRICK_DIR, BRICK_YAML, type Brick } from './brick.js';
export * as cases from './case.js';
export { ConflictResolver, answerToOverwriteRule, toOverwriteRule } from './conflict.js';
export { GenerationError } from './errors.js';
export { Generator, isWritablePath, type GenerateOptions } from './generator.js';
export { configureLogger, LogLevel, logger } from './logger.js';
export { make, type MakeOptions, type MakeResult } from './make.js';
export { TerminalPrompter } from './prompt.js';
export {
  permutations,
  runSubstitution,
  templateFile,
  type FileContents,
  type TemplateFile
} from './substitution.js';
export { DirectoryGeneratorTarget, type GeneratorTarget } from './target.js';
export { render, renderString, renderTemplate, RenderError } from './template.js';
export { coerceVariable, resolveVars } from './vars.js';
export * from './types.js';
