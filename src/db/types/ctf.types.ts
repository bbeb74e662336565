// Database Models

export interface User {
  username: string;
  email: string;
  password_hash: string; // SHA256 hex digest of the password
  bio: string | null;
  avatar_url: string | null;
}

export interface Challenge {
  title: string;
  description: string;
  flag_hash: string; // SHA256 hex digest of the flag
  points: number;
  author: string;
  tags: string[] | null;
  is_active: boolean;
}

export interface Solve {
  challenge_id: string;
  username: string;
  points: number; // copied from the challenge when solved
}

/**
 * A document as read back from the store
 */
export type Stored<T> = T & {
  _id: string;
  created_at: string;
  updated_at: string;
};

/**
 * Placeholder identity recorded as challenge author and solver;
 * login does not issue anything later requests could carry.
 */
export const ANONYMOUS_USERNAME = 'anonymous';
