import { Router } from 'express';
import { ChallengesHandler } from '../../handlers/challenges.handler.js';

export function createChallengesRoutes(handler: ChallengesHandler): Router {
  const router = Router();

  // Anyone may contribute; there are no roles
  router.get('/', handler.listChallenges.bind(handler));
  router.post('/', handler.contributeChallenge.bind(handler));

  return router;
}
