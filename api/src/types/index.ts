import type { LeaderboardEntry } from '../rankings/rankingStore';
import type { LinterErrorKind, ScoreStatus } from '../scoring/types';

export type { LeaderboardEntry };

export type Side = 'a' | 'b';

export interface Submission {
  name: string;
  code: string;
}

export type SideResult =
  | {
      side: Side;
      name: string;
      submitted: true;
      score: number;
      scoreStatus: ScoreStatus;
      error: { kind: LinterErrorKind; message: string } | null;
      // Paid code review slot; nothing fills it yet.
      review: string | null;
    }
  | {
      side: Side;
      name: string;
      submitted: false;
      score: null;
      scoreStatus: null;
      error: null;
      review: null;
    };

export type BattleOutcome =
  | { kind: 'win'; side: Side; winner: string; reason: 'score' | 'walkover' }
  | { kind: 'tie' };

export interface BattleReport {
  sides: [SideResult, SideResult];
  outcome: BattleOutcome;
  leaderboard: LeaderboardEntry[];
}
