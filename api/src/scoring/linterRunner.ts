import { execFile } from 'child_process';
import type { LinterErrorKind } from './types';

export interface LinterRun {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export interface LinterRunOptions {
  timeoutMs: number;
}

export type LinterRunner = (bin: string, args: string[], options: LinterRunOptions) => Promise<LinterRun>;

export class LinterInvocationError extends Error {
  readonly kind: LinterErrorKind;

  constructor(kind: LinterErrorKind, message: string) {
    super(message);
    this.name = 'LinterInvocationError';
    this.kind = kind;
  }
}

const MAX_OUTPUT_BYTES = 8 * 1024 * 1024;

/**
 * Runs the linter and resolves with whatever it printed. A non-zero exit
 * status is a normal result (pylint exits non-zero whenever it reports a
 * message); only a failed launch, a timeout or an overflowing output
 * rejects.
 */
export const execLinter: LinterRunner = (bin, args, { timeoutMs }) =>
  new Promise((resolve, reject) => {
    execFile(
      bin,
      args,
      { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: 'utf8', windowsHide: true },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }

        const code: unknown = err.code;
        if (code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
          reject(new LinterInvocationError('io', `${bin} produced more than ${MAX_OUTPUT_BYTES} bytes of output`));
          return;
        }
        if (typeof code === 'string') {
          reject(new LinterInvocationError('spawn', `could not start ${bin}: ${err.message}`));
          return;
        }
        if (err.killed) {
          reject(new LinterInvocationError('timeout', `${bin} did not finish within ${timeoutMs}ms`));
          return;
        }

        resolve({ stdout, stderr, exitCode: typeof code === 'number' ? code : null });
      },
    );
  });
