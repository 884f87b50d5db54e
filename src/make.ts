import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { loadBrick } from './brick.js';
import { GenerationError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { DirectoryGeneratorTarget } from './target.js';
import { resolveVars } from './vars.js';
import {
  ErrorCode,
  type Bindings,
  type FileConflictResolution,
  type GeneratedFile,
  type GeneratorHooks,
  type Prompter
} from './types.js';

export interface MakeOptions {
  outputDir: string;
  vars?: Bindings;
  fileConflictResolution?: FileConflictResolution;
  prompter?: Prompter;
  hooks?: GeneratorHooks;
}

export interface MakeResult {
  success: boolean;
  files: GeneratedFile[];
  message: string;
  brickName?: string;
  errorCode?: ErrorCode;
}

async function validateTargetDirectory(outputDir: string): Promise<void> {
  try {
    await fs.mkdir(outputDir, { recursive: true });
    const targetStat = await fs.stat(outputDir);
    if (!targetStat.isDirectory()) {
      throw new GenerationError(
        `INVALID PATH: Not a directory\n` +
        `Action: Ensure ${outputDir} is a directory`,
        ErrorCode.FILE_WRITE_FAILED
      );
    }
  } catch (error) {
    if (error instanceof GenerationError) throw error;
    throw new GenerationError(
      `CANNOT ACCESS: Output directory ${outputDir}\n` +
      `Action: Check the path and your permissions`,
      ErrorCode.FILE_WRITE_FAILED,
      { cause: error }
    );
  }

  const testFile = join(outputDir, `.brickyard-test-${Date.now()}`);
  try {
    await fs.writeFile(testFile, 'test');
    await fs.unlink(testFile);
  } catch (error) {
    throw new GenerationError(
      `NO WRITE PERMISSION: ${outputDir}\n` +
      `Action: Check directory permissions`,
      ErrorCode.FILE_WRITE_FAILED,
      { cause: error }
    );
  }
}

/** Loads a brick, resolves its variables and generates it into `outputDir`. */
export async function make(brickPath: string, options: MakeOptions): Promise<MakeResult> {
  let brickName: string | undefined;

  try {
    const { manifest, generator } = await loadBrick(brickPath);
    brickName = manifest.name;

    await validateTargetDirectory(options.outputDir);

    const vars = await resolveVars(manifest.vars, options.vars ?? {}, options.prompter);
    const target = new DirectoryGeneratorTarget(options.outputDir, { prompter: options.prompter });

    logger.info('Generating brick', { brick: manifest.name, version: manifest.version, output: options.outputDir });

    const files = await logger.operation(`Generating ${manifest.name}`, () =>
      generator.generate(target, {
        vars,
        ...(options.fileConflictResolution ? { fileConflictResolution: options.fileConflictResolution } : {}),
        ...(options.hooks ? { hooks: options.hooks } : {})
      })
    );

    return {
      success: true,
      files,
      brickName,
      message: `Generated ${files.length} file(s) from ${manifest.name}`
    };
  } catch (error) {
    const message = errorMessage(error);
    const errorCode = error instanceof GenerationError ? error.code : ErrorCode.UNKNOWN_ERROR;

    logger.error('Generation failed', { error: message, code: errorCode });

    return {
      success: false,
      files: error instanceof GenerationError ? error.generatedFiles : [],
      message,
      errorCode,
      ...(brickName ? { brickName } : {})
    };
  }
}
