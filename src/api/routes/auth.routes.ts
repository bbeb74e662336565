import { Router } from 'express';
import { AuthHandler } from '../../handlers/auth.handler.js';

export function createAuthRoutes(handler: AuthHandler): Router {
  const router = Router();

  router.post('/register', handler.register.bind(handler));
  router.post('/login', handler.login.bind(handler));

  return router;
}
