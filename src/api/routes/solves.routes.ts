import { Router } from 'express';
import { SolvesHandler } from '../../handlers/solves.handler.js';

export function createSolvesRoutes(handler: SolvesHandler): Router {
  const router = Router();

  /**
   * POST /api/submit-flag
   *
   * Body: { challenge_id: string, flag: string }
   *
   * Response:
   * - 200: { ok: true, message: 'Flag accepted' }
   * - 400: malformed challenge id, or incorrect flag
   * - 404: challenge missing or inactive
   * - 422: body has the wrong shape
   */
  router.post('/submit-flag', handler.submitFlag.bind(handler));

  router.get('/leaderboard', handler.getLeaderboard.bind(handler));

  return router;
}
