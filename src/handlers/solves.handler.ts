import { Request, Response, NextFunction } from 'express';
import { ChallengesRepository } from '../db/repositories/challenges.repository.js';
import { LeaderboardEntry, SolvesRepository } from '../db/repositories/solves.repository.js';
import { ANONYMOUS_USERNAME } from '../db/types/ctf.types.js';
import { HashingService } from '../services/hashing.service.js';
import { parseSubmitFlagRequest } from './validation.js';
import { Errors } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const LEADERBOARD_LIMIT = 50;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface SubmitFlagResponse {
  ok: true;
  message: string;
}

export interface LeaderboardResponse {
  ok: true;
  items: LeaderboardEntry[];
}

export class SolvesHandler {
  constructor(
    private readonly challengesRepo: ChallengesRepository,
    private readonly solvesRepo: SolvesRepository,
    private readonly hashing: HashingService
  ) {}

  async submitFlag(req: Request, res: Response<SubmitFlagResponse>, next: NextFunction): Promise<void> {
    try {
      const { challenge_id: challengeId, flag } = parseSubmitFlagRequest(req.body);

      if (!UUID_PATTERN.test(challengeId)) {
        throw Errors.badRequest('Invalid challenge id', 'challenge_id');
      }

      const challenge = await this.challengesRepo.findById(challengeId);
      if (!challenge || !challenge.is_active) {
        throw Errors.notFound('Challenge');
      }

      if (!this.hashing.matches(flag, challenge.flag_hash)) {
        throw Errors.badRequest('Incorrect flag', 'flag');
      }

      const solveId = await this.solvesRepo.create({
        challenge_id: challenge._id,
        username: ANONYMOUS_USERNAME,
        points: challenge.points,
      });

      logger.info({ solveId, challengeId, points: challenge.points }, 'Flag accepted');
      res.json({ ok: true, message: 'Flag accepted' });
    } catch (error) {
      next(error);
    }
  }

  async getLeaderboard(req: Request, res: Response<LeaderboardResponse>, next: NextFunction): Promise<void> {
    try {
      const items = await this.solvesRepo.leaderboard(LEADERBOARD_LIMIT);
      res.json({ ok: true, items });
    } catch (error) {
      next(error);
    }
  }
}
