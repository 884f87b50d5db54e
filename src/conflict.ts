import { GenerationError } from './errors.js';
import { ErrorCode, type FileConflictResolution, type OverwriteRule, type Prompter } from './types.js';

export type ConflictAction = 'overwrite' | 'skip' | 'append';

const ALWAYS_RULES: ReadonlySet<OverwriteRule> = new Set(['alwaysOverwrite', 'alwaysSkip', 'alwaysAppend']);

export function toOverwriteRule(resolution: FileConflictResolution): OverwriteRule | undefined {
  switch (resolution) {
    case 'overwrite': return 'alwaysOverwrite';
    case 'skip': return 'alwaysSkip';
    case 'append': return 'alwaysAppend';
    case 'prompt': return undefined;
  }
}

/** Maps a `(Yyna)` answer; anything unrecognised overwrites this file only. */
export function answerToOverwriteRule(answer: string): OverwriteRule {
  switch (answer.trim()) {
    case 'Y': return 'alwaysOverwrite';
    case 'n': return 'skipOnce';
    case 'a': return 'appendOnce';
    case 'y':
    default: return 'overwriteOnce';
  }
}

function toAction(rule: OverwriteRule): ConflictAction {
  switch (rule) {
    case 'alwaysSkip':
    case 'skipOnce':
      return 'skip';
    case 'alwaysAppend':
    case 'appendOnce':
      return 'append';
    case 'alwaysOverwrite':
    case 'overwriteOnce':
      return 'overwrite';
  }
}

/**
 * Run-scoped overwrite decision. The first rule handed in sticks; "always"
 * rules answer every later conflict, anything else asks the prompter again.
 */
export class ConflictResolver {
  private rule: OverwriteRule | undefined;

  constructor(private readonly prompter?: Prompter) {}

  get currentRule(): OverwriteRule | undefined {
    return this.rule;
  }

  seed(rule: OverwriteRule | undefined): void {
    this.rule ??= rule;
  }

  async resolve(fileName: string): Promise<ConflictAction> {
    if (this.rule && ALWAYS_RULES.has(this.rule)) {
      return toAction(this.rule);
    }

    if (!this.prompter) {
      throw new GenerationError(
        `Cannot resolve conflict for ${fileName}: no prompt available\n` +
        `Action: Pass a conflict policy of overwrite, skip or append`,
        ErrorCode.PROMPT_UNAVAILABLE
      );
    }

    const answer = await this.prompter.prompt(`Overwrite ${fileName}? (Yyna)`);
    this.rule = answerToOverwriteRule(answer);
    return toAction(this.rule);
  }
}
