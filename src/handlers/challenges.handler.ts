import { Request, Response, NextFunction } from 'express';
import { ChallengesRepository } from '../db/repositories/challenges.repository.js';
import { ANONYMOUS_USERNAME, Challenge, Stored } from '../db/types/ctf.types.js';
import { HashingService } from '../services/hashing.service.js';
import { parseContributeChallengeRequest } from './validation.js';
import { logger } from '../utils/logger.js';

export const CHALLENGE_LIST_LIMIT = 100;

/**
 * A challenge as shown to players: everything but the flag digest
 */
export type PublicChallenge = Omit<Stored<Challenge>, 'flag_hash'>;

export interface ContributeChallengeResponse {
  ok: true;
  challenge_id: string;
}

export interface ChallengeListResponse {
  ok: true;
  items: PublicChallenge[];
}

export class ChallengesHandler {
  constructor(
    private readonly challengesRepo: ChallengesRepository,
    private readonly hashing: HashingService
  ) {}

  private toResponse(challenge: Stored<Challenge>): PublicChallenge {
    const { flag_hash: _flagHash, ...visible } = challenge;
    return visible;
  }

  async contributeChallenge(
    req: Request,
    res: Response<ContributeChallengeResponse>,
    next: NextFunction
  ): Promise<void> {
    try {
      const { title, description, flag, points, tags } = parseContributeChallengeRequest(req.body);

      const challengeId = await this.challengesRepo.create({
        title,
        description,
        flag_hash: this.hashing.digest(flag),
        points,
        author: ANONYMOUS_USERNAME,
        tags,
        is_active: true,
      });

      logger.info({ challengeId, points }, 'Challenge contributed');
      res.json({ ok: true, challenge_id: challengeId });
    } catch (error) {
      next(error);
    }
  }

  async listChallenges(req: Request, res: Response<ChallengeListResponse>, next: NextFunction): Promise<void> {
    try {
      const challenges = await this.challengesRepo.findActive(CHALLENGE_LIST_LIMIT);
      res.json({ ok: true, items: challenges.map((c) => this.toResponse(c)) });
    } catch (error) {
      next(error);
    }
  }
}
