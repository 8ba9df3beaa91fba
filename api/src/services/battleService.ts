import { NoSubmissionsError } from '../errors';
import { logger } from '../logger';
import type { RankingPersistence } from '../rankings/persistence';
import { RankingStore, type LeaderboardEntry } from '../rankings/rankingStore';
import type { CodeScorer } from '../scoring/types';
import type { BattleOutcome, BattleReport, Side, SideResult, Submission } from '../types';

export interface BattleServiceDeps {
  scorer: CodeScorer;
  persistence: RankingPersistence;
}

export function hasCode(submission: Submission): boolean {
  return submission.code.trim().length > 0;
}

/**
 * Picks the winner of a battle. Both sides scored: the higher score wins and
 * equal scores tie. One side scored: it wins by walkover.
 */
export function resolveOutcome(a: SideResult, b: SideResult): BattleOutcome {
  if (a.submitted && b.submitted) {
    if (a.score > b.score) return { kind: 'win', side: a.side, winner: a.name, reason: 'score' };
    if (b.score > a.score) return { kind: 'win', side: b.side, winner: b.name, reason: 'score' };
    return { kind: 'tie' };
  }
  if (a.submitted) return { kind: 'win', side: a.side, winner: a.name, reason: 'walkover' };
  if (b.submitted) return { kind: 'win', side: b.side, winner: b.name, reason: 'walkover' };
  throw new NoSubmissionsError();
}

export class BattleService {
  private readonly scorer: CodeScorer;
  private readonly persistence: RankingPersistence;

  constructor(deps: BattleServiceDeps) {
    this.scorer = deps.scorer;
    this.persistence = deps.persistence;
  }

  async fight(a: Submission, b: Submission): Promise<BattleReport> {
    if (!hasCode(a) && !hasCode(b)) {
      logger.warn({ module: 'services.battleService', dev_a: a.name, dev_b: b.name }, 'Battle rejected: no submissions');
      throw new NoSubmissionsError();
    }

    const store = new RankingStore(this.persistence);
    await store.load();

    const sideA = await this.scoreSide('a', a, store);
    const sideB = await this.scoreSide('b', b, store);
    const outcome = resolveOutcome(sideA, sideB);

    // Saved even after a walkover or a tie.
    await store.save();

    logger.info({
      module: 'services.battleService',
      dev_a: a.name,
      dev_b: b.name,
      score_a: sideA.score,
      score_b: sideB.score,
      outcome: outcome.kind === 'tie' ? 'tie' : `${outcome.reason}:${outcome.side}`,
    }, 'Battle resolved');

    return { sides: [sideA, sideB], outcome, leaderboard: store.leaderboard() };
  }

  async leaderboard(): Promise<LeaderboardEntry[]> {
    const store = new RankingStore(this.persistence);
    await store.load();
    return store.leaderboard();
  }

  private async scoreSide(side: Side, submission: Submission, store: RankingStore): Promise<SideResult> {
    if (!hasCode(submission)) {
      return { side, name: submission.name, submitted: false, score: null, scoreStatus: null, error: null, review: null };
    }

    const outcome = await this.scorer.score(submission.code);
    store.record(submission.name, outcome.score);

    return {
      side,
      name: submission.name,
      submitted: true,
      score: outcome.score,
      scoreStatus: outcome.status,
      error: outcome.status === 'failed' ? { kind: outcome.errorKind, message: outcome.message } : null,
      review: null,
    };
  }
}
