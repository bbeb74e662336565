import { Request, Response, NextFunction } from 'express';
import { UsersRepository } from '../db/repositories/users.repository.js';
import { HashingService } from '../services/hashing.service.js';
import { parseLoginRequest, parseRegisterRequest } from './validation.js';
import { Errors } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface RegisterResponse {
  ok: true;
  user_id: string;
}

export interface LoginResponse {
  ok: true;
  username: string;
}

export class AuthHandler {
  constructor(
    private readonly usersRepo: UsersRepository,
    private readonly hashing: HashingService
  ) {}

  async register(req: Request, res: Response<RegisterResponse>, next: NextFunction): Promise<void> {
    try {
      const { username, email, password } = parseRegisterRequest(req.body);

      const existing = await this.usersRepo.findByUsernameOrEmail(username, email);
      if (existing) {
        throw Errors.conflict('Username or email already exists');
      }

      const userId = await this.usersRepo.create({
        username,
        email,
        password_hash: this.hashing.digest(password),
        bio: null,
        avatar_url: null,
      });

      logger.info({ userId, username }, 'User registered');
      res.json({ ok: true, user_id: userId });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Same 401 whether the username is unknown or the password is wrong
   */
  async login(req: Request, res: Response<LoginResponse>, next: NextFunction): Promise<void> {
    try {
      const { username, password } = parseLoginRequest(req.body);

      const user = await this.usersRepo.findByCredentials(username, this.hashing.digest(password));
      if (!user) {
        throw Errors.unauthorized('Invalid credentials');
      }

      res.json({ ok: true, username: user.username });
    } catch (error) {
      next(error);
    }
  }
}
