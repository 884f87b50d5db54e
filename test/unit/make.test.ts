import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { make } from '../../src/make.js';
import { ErrorCode } from '../../src/types.js';
import { WIDGET_FILES, WIDGET_MANIFEST, writeBrick } from '../helpers/brick.js';
import { scriptedPrompter } from '../helpers/prompter.js';

let testDir: string;
let brickPath: string;
let outputDir: string;

const read = (path: string) => readFileSync(join(outputDir, path), 'utf-8');

describe('make', () => {
  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'brickyard-make-'));
    brickPath = writeBrick(join(testDir, 'widget'), WIDGET_MANIFEST, WIDGET_FILES);
    outputDir = join(testDir, 'out');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should generate every template into the output directory', async () => {
    const result = await make(brickPath, { outputDir, vars: { name: 'MyWidget', models: ['user', 'order'] } });

    expect(result).toMatchObject({ success: true, brickName: 'widget', message: 'Generated 4 file(s) from widget' });
    expect(result.files).toEqual([
      { path: join(outputDir, 'README.md'), status: 'created' },
      { path: join(outputDir, 'lib/models/user.ts'), status: 'created' },
      { path: join(outputDir, 'lib/models/order.ts'), status: 'created' },
      { path: join(outputDir, 'lib/my_widget.ts'), status: 'created' }
    ]);
    expect(read('README.md')).toBe('Generated by MyWidget');
    expect(read('lib/my_widget.ts')).toBe('// MyWidget\nclass MyWidget {}');
    expect(read('lib/models/order.ts')).toBe('class Order {}');
  });

  it('should fall back to declared defaults', async () => {
    const result = await make(brickPath, { outputDir, vars: { name: 'w' } });

    expect(result.files.map(file => file.path)).toContain(join(outputDir, 'lib/models/user.ts'));
    expect(result.files).toHaveLength(3);
  });

  it('should report identical files on a second run', async () => {
    await make(brickPath, { outputDir, vars: { name: 'MyWidget' } });

    const result = await make(brickPath, { outputDir, vars: { name: 'MyWidget' } });

    expect(result.success).toBe(true);
    expect(result.files.map(file => file.status)).toEqual(['identical', 'identical', 'identical']);
  });

  it('should apply the conflict policy to changed files', async () => {
    await make(brickPath, { outputDir, vars: { name: 'MyWidget' } });
    writeFileSync(join(outputDir, 'README.md'), 'edited');

    const skipped = await make(brickPath, { outputDir, vars: { name: 'MyWidget' }, fileConflictResolution: 'skip' });
    expect(skipped.files[0]?.status).toBe('skipped');
    expect(read('README.md')).toBe('edited');

    const appended = await make(brickPath, { outputDir, vars: { name: 'MyWidget' }, fileConflictResolution: 'append' });
    expect(appended.files[0]?.status).toBe('appended');
    expect(read('README.md')).toBe('editedGenerated by MyWidget');
  });

  it('should ask the prompter about conflicts', async () => {
    await make(brickPath, { outputDir, vars: { name: 'MyWidget' } });
    writeFileSync(join(outputDir, 'README.md'), 'edited');
    const { prompter, prompt } = scriptedPrompter('y');

    const result = await make(brickPath, { outputDir, vars: { name: 'MyWidget' }, prompter });

    expect(result.files[0]?.status).toBe('overwritten');
    expect(prompt).toHaveBeenCalledWith('Overwrite README.md? (Yyna)');
    expect(read('README.md')).toBe('Generated by MyWidget');
  });

  it('should stop at a conflict it cannot ask about and report what was written', async () => {
    await make(brickPath, { outputDir, vars: { name: 'MyWidget' } });
    writeFileSync(join(outputDir, 'lib/models/user.ts'), 'edited');

    const result = await make(brickPath, { outputDir, vars: { name: 'MyWidget' } });

    expect(result.success).toBe(false);
    expect(result.errorCode).toBe(ErrorCode.PROMPT_UNAVAILABLE);
    expect(result.files).toEqual([{ path: join(outputDir, 'README.md'), status: 'identical' }]);
  });

  it('should fail on a missing required variable', async () => {
    const result = await make(brickPath, { outputDir });

    expect(result).toMatchObject({ success: false, errorCode: ErrorCode.INVALID_VARIABLE, files: [] });
  });

  it('should fail for a directory without brick.yaml', async () => {
    const result = await make(join(testDir, 'missing'), { outputDir });

    expect(result).toMatchObject({ success: false, errorCode: ErrorCode.BRICK_NOT_FOUND });
  });
});
