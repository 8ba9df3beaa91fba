import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { execLinter, LinterInvocationError, type LinterRunner } from '../../src/scoring/linterRunner';
import { LinterScorer, SUBMISSION_FILE_NAME } from '../../src/scoring/linterScorer';

describe('LinterScorer', () => {
  let tmpRoot: string;

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'lint-arena-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  it('lints a temp copy of the code in score-only mode and parses the rating', async () => {
    const seen: { bin: string; args: string[]; contents: string; timeoutMs: number }[] = [];
    const runner: LinterRunner = async (bin, args, { timeoutMs }) => {
      seen.push({ bin, args, contents: await fs.readFile(args[0], 'utf8'), timeoutMs });
      return { stdout: 'Your code has been rated at 5.00/10\n', stderr: '', exitCode: 16 };
    };
    const scorer = new LinterScorer({ bin: 'pylint', timeoutMs: 1234, runner, tmpRoot });

    const outcome = await scorer.score("print('x')\n");

    expect(outcome).toEqual({ status: 'rated', score: 5 });
    expect(seen).toHaveLength(1);
    expect(seen[0].bin).toBe('pylint');
    expect(seen[0].args[1]).toBe('--score=y');
    expect(path.basename(seen[0].args[0])).toBe(SUBMISSION_FILE_NAME);
    expect(seen[0].contents).toBe("print('x')\n");
    expect(seen[0].timeoutMs).toBe(1234);
  });

  it('removes the temp file after a successful run', async () => {
    let filePath = '';
    const runner: LinterRunner = async (_bin, args) => {
      filePath = args[0];
      return { stdout: 'Your code has been rated at 9.00/10', stderr: '', exitCode: 0 };
    };
    await new LinterScorer({ bin: 'pylint', timeoutMs: 1000, runner, tmpRoot }).score('x = 1\n');

    await expect(fs.access(filePath)).rejects.toThrow();
    expect(await fs.readdir(tmpRoot)).toEqual([]);
  });

  it('keeps the score when the temp dir cannot be removed', async () => {
    const rm = vi.spyOn(fs, 'rm').mockRejectedValueOnce(new Error('EBUSY: resource busy or locked'));
    const runner: LinterRunner = async () => ({ stdout: 'Your code has been rated at 6.00/10', stderr: '', exitCode: 0 });

    const outcome = await new LinterScorer({ bin: 'pylint', timeoutMs: 1000, runner, tmpRoot }).score('x = 1\n');

    expect(outcome).toEqual({ status: 'rated', score: 6 });
    expect(rm).toHaveBeenCalledTimes(1);
  });

  it('treats output without a rating line as unrated', async () => {
    const runner: LinterRunner = async () => ({ stdout: 'E0001: syntax-error\n', stderr: '', exitCode: 2 });
    const outcome = await new LinterScorer({ bin: 'pylint', timeoutMs: 1000, runner, tmpRoot }).score('def (');

    expect(outcome).toEqual({ status: 'unrated', score: 0 });
  });

  it('reports a timeout as a failed run and still cleans up', async () => {
    const runner: LinterRunner = async () => {
      throw new LinterInvocationError('timeout', 'pylint did not finish within 10ms');
    };
    const outcome = await new LinterScorer({ bin: 'pylint', timeoutMs: 10, runner, tmpRoot }).score('x = 1\n');

    expect(outcome).toEqual({
      status: 'failed',
      score: 0,
      errorKind: 'timeout',
      message: 'pylint did not finish within 10ms',
    });
    expect(await fs.readdir(tmpRoot)).toEqual([]);
  });

  it('classifies unexpected errors as io failures', async () => {
    const runner = vi.fn<LinterRunner>().mockRejectedValue(new Error('disk full'));
    const outcome = await new LinterScorer({ bin: 'pylint', timeoutMs: 1000, runner, tmpRoot }).score('x = 1\n');

    expect(outcome).toEqual({ status: 'failed', score: 0, errorKind: 'io', message: 'disk full' });
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('gives the same score for the same code', async () => {
    const runner: LinterRunner = async (_bin, args) => {
      const code = await fs.readFile(args[0], 'utf8');
      return { stdout: `Your code has been rated at ${code.length}.00/10`, stderr: '', exitCode: 0 };
    };
    const scorer = new LinterScorer({ bin: 'pylint', timeoutMs: 1000, runner, tmpRoot });

    const first = await scorer.score('abc');
    const second = await scorer.score('abc');

    expect(first).toEqual({ status: 'rated', score: 3 });
    expect(second).toEqual(first);
  });

  it('keeps scores inside [0, 10]', async () => {
    const outputs = ['Your code has been rated at 42.00/10', 'Your code has been rated at -12.50/10', 'nothing'];
    const runner: LinterRunner = async () => ({ stdout: outputs.shift() ?? '', stderr: '', exitCode: 0 });
    const scorer = new LinterScorer({ bin: 'pylint', timeoutMs: 1000, runner, tmpRoot });

    for (let i = 0; i < 3; i++) {
      const { score } = await scorer.score('x = 1\n');
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(10);
    }
  });
});

describe('execLinter', () => {
  it('rejects with a spawn error when the linter binary does not exist', async () => {
    const run = execLinter('lint-arena-missing-linter-bin', ['file.py', '--score=y'], { timeoutMs: 5000 });

    await expect(run).rejects.toBeInstanceOf(LinterInvocationError);
    await expect(run).rejects.toMatchObject({ kind: 'spawn' });
  });
});
