import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { execLinter, LinterInvocationError, type LinterRunner } from './linterRunner';
import { parseRating } from './ratingParser';
import type { CodeScorer, ScoreOutcome } from './types';

export interface LinterScorerOptions {
  bin: string;
  timeoutMs: number;
  runner?: LinterRunner;
  tmpRoot?: string;
}

export const SUBMISSION_FILE_NAME = 'submission.py';

/**
 * Scores code by writing it to a fresh temp directory and running the
 * linter over it in score-only mode. The directory is removed before the
 * call settles, whatever happened in between.
 */
export class LinterScorer implements CodeScorer {
  private readonly bin: string;
  private readonly timeoutMs: number;
  private readonly runner: LinterRunner;
  private readonly tmpRoot: string;

  constructor(options: LinterScorerOptions) {
    this.bin = options.bin;
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? execLinter;
    this.tmpRoot = options.tmpRoot ?? os.tmpdir();
  }

  async score(code: string): Promise<ScoreOutcome> {
    let workDir: string | undefined;
    try {
      workDir = await fs.mkdtemp(path.join(this.tmpRoot, 'lint-arena-'));
      const filePath = path.join(workDir, SUBMISSION_FILE_NAME);
      await fs.writeFile(filePath, code, 'utf8');

      logger.debug({
        module: 'scoring.linterScorer',
        linter: this.bin,
        file_path: filePath,
        code_length: code.length,
      }, 'Linter invoked');

      const run = await this.runner(this.bin, [filePath, '--score=y'], { timeoutMs: this.timeoutMs });
      const score = parseRating(run.stdout);
      if (score === null) {
        logger.info({ module: 'scoring.linterScorer', linter: this.bin, exit_code: run.exitCode }, 'No rating in linter output');
        return { status: 'unrated', score: 0 };
      }

      return { status: 'rated', score };
    } catch (err) {
      const errorKind = err instanceof LinterInvocationError ? err.kind : 'io';
      const message = errorMessage(err);
      logger.error({
        module: 'scoring.linterScorer',
        linter: this.bin,
        error_kind: errorKind,
        error_message: message,
      }, 'Linter run fail');
      return { status: 'failed', score: 0, errorKind, message };
    } finally {
      if (workDir !== undefined) {
        await this.removeWorkDir(workDir);
      }
    }
  }

  // A leftover temp dir is logged, never allowed to replace the outcome.
  private async removeWorkDir(workDir: string): Promise<void> {
    try {
      await fs.rm(workDir, { recursive: true, force: true });
    } catch (err) {
      logger.warn({
        module: 'scoring.linterScorer',
        work_dir: workDir,
        error_message: errorMessage(err),
      }, 'Temp dir cleanup fail');
    }
  }
}
