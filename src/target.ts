import { promises as fs } from 'node:fs';
import { join, basename, relative } from 'node:path';
import { appendBytes, atomicWrite } from './atomic.js';
import { ConflictResolver } from './conflict.js';
import { logger } from './logger.js';
import { exists } from './utils.js';
import type { GeneratedFile, OverwriteRule, Prompter } from './types.js';

/** Knows how to commit a rendered file somewhere. */
export interface GeneratorTarget {
  createFile(path: string, content: Uint8Array, overwriteRule?: OverwriteRule): Promise<GeneratedFile>;
}

export interface DirectoryGeneratorTargetOptions {
  prompter?: Prompter;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.compare(a, b) === 0;
}

/**
 * Writes files under `dir`. Must not receive overlapping `createFile` calls:
 * the conflict state is carried from one call to the next.
 */
export class DirectoryGeneratorTarget implements GeneratorTarget {
  private readonly resolver: ConflictResolver;

  constructor(readonly dir: string, options: DirectoryGeneratorTargetOptions = {}) {
    this.resolver = new ConflictResolver(options.prompter);
  }

  async createFile(path: string, content: Uint8Array, overwriteRule?: OverwriteRule): Promise<GeneratedFile> {
    this.resolver.seed(overwriteRule);

    const filePath = join(this.dir, path);
    const display = relative(process.cwd(), filePath);

    if (!await exists(filePath)) {
      await atomicWrite(filePath, content);
      logger.debug(`created ${display}`);
      return { path: filePath, status: 'created' };
    }

    const existing = await fs.readFile(filePath);

    if (sameBytes(existing, content)) {
      logger.debug(`identical ${display}`);
      return { path: filePath, status: 'identical' };
    }

    logger.info(`conflict ${display}`, { rule: this.resolver.currentRule ?? 'prompt' });
    const action = await this.resolver.resolve(basename(filePath));

    switch (action) {
      case 'skip':
        logger.debug(`skipped ${display}`);
        return { path: filePath, status: 'skipped' };
      case 'append':
        await appendBytes(filePath, content);
        logger.debug(`appended ${display}`);
        return { path: filePath, status: 'appended' };
      case 'overwrite':
        await atomicWrite(filePath, content);
        logger.debug(`overwritten ${display}`);
        return { path: filePath, status: 'overwritten' };
    }
  }
}
