export type LinterErrorKind = 'spawn' | 'timeout' | 'io';

export type ScoreOutcome =
  | { status: 'rated'; score: number }
  | { status: 'unrated'; score: 0 }
  | { status: 'failed'; score: 0; errorKind: LinterErrorKind; message: string };

export type ScoreStatus = ScoreOutcome['status'];

/** Turns one code submission into a score in [0, 10]. Never rejects. */
export interface CodeScorer {
  score(code: string): Promise<ScoreOutcome>;
}
