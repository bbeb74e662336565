import { DocumentStore } from '../documentStore.js';
import { SolveCollection } from '../schemas.js';
import { Solve } from '../types/ctf.types.js';

export interface LeaderboardEntry {
  username: string;
  score: number;
}

export class SolvesRepository {
  constructor(private readonly store: DocumentStore) {}

  // Repeat solves of the same challenge are recorded as-is
  async create(solve: Solve): Promise<string> {
    return this.store.create(SolveCollection, solve);
  }

  async leaderboard(limit: number): Promise<LeaderboardEntry[]> {
    const totals = await this.store.aggregate(SolveCollection, {
      groupBy: 'username',
      sum: 'points',
      limit,
    });

    return totals.map(({ key, total }) => ({ username: key, score: total }));
  }
}
