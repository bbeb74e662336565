import { Router } from 'express';
import { StatusHandler } from '../../handlers/status.handler.js';

export function createStatusRoutes(statusHandler: StatusHandler): Router {
  const router = Router();

  router.get('/', statusHandler.getRoot.bind(statusHandler));

  /**
   * GET /test
   *
   * Reports backend and store reachability plus up to 10 collection names.
   * Store errors are reported in the body, never as an error status.
   */
  router.get('/test', statusHandler.getDiagnostics.bind(statusHandler));

  return router;
}
