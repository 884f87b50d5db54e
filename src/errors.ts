import { ErrorCode, type GeneratedFile } from './types.js';

export class GenerationError extends Error {
  /** Files already committed when a run aborted with this error. */
  generatedFiles: GeneratedFile[] = [];

  constructor(message: string, public code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
