import type { RankingPersistence, Rankings } from './persistence';

export interface LeaderboardEntry {
  rank: number;
  name: string;
  score: number;
}

export class RankingStore {
  private rankings: Rankings = new Map();

  constructor(private readonly persistence: RankingPersistence) {}

  async load(): Promise<void> {
    this.rankings = await this.persistence.load();
  }

  async save(): Promise<void> {
    await this.persistence.save(new Map(this.rankings));
  }

  // Last write wins; names are stored exactly as given.
  record(name: string, score: number): void {
    this.rankings.set(name, score);
  }

  get(name: string): number | undefined {
    return this.rankings.get(name);
  }

  get size(): number {
    return this.rankings.size;
  }

  /** Highest score first, 1-based ranks. Equal scores keep insertion order. */
  leaderboard(): LeaderboardEntry[] {
    return [...this.rankings]
      .sort(([, a], [, b]) => b - a)
      .map(([name, score], idx) => ({ rank: idx + 1, name, score }));
  }
}
