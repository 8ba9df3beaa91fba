import type { Server } from 'http';
import { createApp } from '../src/app';
import { InMemoryRankingPersistence } from '../src/rankings/persistence';
import { BattleService } from '../src/services/battleService';
import type { CodeScorer, ScoreOutcome } from '../src/scoring/types';

export function rated(score: number): ScoreOutcome {
  return { status: 'rated', score };
}

/** Scores code by lookup; unknown code is unrated. */
export class FakeScorer implements CodeScorer {
  readonly calls: string[] = [];

  constructor(private readonly outcomes: Record<string, ScoreOutcome> = {}) {}

  async score(code: string): Promise<ScoreOutcome> {
    this.calls.push(code);
    return this.outcomes[code] ?? { status: 'unrated', score: 0 };
  }
}

export interface TestServer {
  baseUrl: string;
  persistence: InMemoryRankingPersistence;
  scorer: FakeScorer;
  close(): Promise<void>;
}

export async function startTestServer(
  outcomes: Record<string, ScoreOutcome> = {},
  initial: Iterable<[string, number]> = [],
): Promise<TestServer> {
  const scorer = new FakeScorer(outcomes);
  const persistence = new InMemoryRankingPersistence(initial);
  const battleService = new BattleService({ scorer, persistence });
  const app = createApp({ battleService, corsOrigin: 'http://localhost:3000' });

  const server: Server = await new Promise((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    persistence,
    scorer,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
