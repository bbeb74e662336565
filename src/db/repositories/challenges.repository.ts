import { DocumentStore } from '../documentStore.js';
import { ChallengeCollection } from '../schemas.js';
import { Challenge, Stored } from '../types/ctf.types.js';

export class ChallengesRepository {
  constructor(private readonly store: DocumentStore) {}

  async create(challenge: Challenge): Promise<string> {
    return this.store.create(ChallengeCollection, challenge);
  }

  async findById(id: string): Promise<Stored<Challenge> | null> {
    return this.store.findById(ChallengeCollection, id);
  }

  async findActive(limit: number): Promise<Stored<Challenge>[]> {
    return this.store.findMany(ChallengeCollection, { is_active: true }, limit);
  }
}
