import { Challenge, Solve, Stored, User } from './types/ctf.types.js';
import { Errors } from '../utils/errors.js';

export type Row = Record<string, unknown>;

/**
 * Maps a document shape onto one store collection
 */
export interface Collection<T> {
  name: string;

  /**
   * Field-level rules checked before a record is written
   */
  validate(record: T): void;

  /**
   * Turn a stored row back into a typed document
   */
  decode(row: Row): Stored<T>;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const SQLITE_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

function malformed(collection: string, field: string): Error {
  return Errors.internal(`Malformed ${collection} document: ${field}`);
}

function readString(collection: string, row: Row, field: string): string {
  const value = row[field];
  if (typeof value !== 'string') {
    throw malformed(collection, field);
  }
  return value;
}

function readNullableString(collection: string, row: Row, field: string): string | null {
  const value = row[field];
  if (value === null || value === undefined) {
    return null;
  }
  return readString(collection, row, field);
}

function readInteger(collection: string, row: Row, field: string): number {
  const value = Number(row[field]);
  if (!Number.isInteger(value)) {
    throw malformed(collection, field);
  }
  return value;
}

// SQLite hands booleans back as 0/1
function readBoolean(collection: string, row: Row, field: string): boolean {
  const value = row[field];
  if (typeof value === 'boolean') return value;
  if (value === 0 || value === 1) return value === 1;
  throw malformed(collection, field);
}

// Postgres parses json columns itself, SQLite returns the text
function readTags(collection: string, row: Row): string[] | null {
  let value: unknown = row.tags;
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    value = JSON.parse(value);
  }
  if (!Array.isArray(value) || !value.every((tag): tag is string => typeof tag === 'string')) {
    throw malformed(collection, 'tags');
  }
  return value;
}

function readTimestamp(collection: string, row: Row, field: 'created_at' | 'updated_at'): string {
  const value = row[field];
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string') {
    // CURRENT_TIMESTAMP in SQLite is UTC without a zone designator
    const normalized = SQLITE_TIMESTAMP.test(value) ? `${value.replace(' ', 'T')}Z` : value;
    const date = new Date(normalized);
    if (!isNaN(date.getTime())) {
      return date.toISOString();
    }
  }
  throw malformed(collection, field);
}

function readId(collection: string, row: Row): string {
  return readString(collection, row, 'id');
}

/**
 * Points live in a bigint column and are summed as JS numbers, so they stop
 * at the largest integer a number holds exactly
 */
export const MAX_POINTS = Number.MAX_SAFE_INTEGER;

function validatePoints(points: number): void {
  if (!Number.isInteger(points) || points < 0) {
    throw Errors.validation('points must be a non-negative integer', 'points');
  }
  if (points > MAX_POINTS) {
    throw Errors.validation(`points must be at most ${MAX_POINTS}`, 'points');
  }
}

export const UserCollection: Collection<User> = {
  name: 'user',

  validate(record) {
    if (!isValidEmail(record.email)) {
      throw Errors.validation('value is not a valid email address', 'email');
    }
  },

  decode(row) {
    return {
      _id: readId('user', row),
      username: readString('user', row, 'username'),
      email: readString('user', row, 'email'),
      password_hash: readString('user', row, 'password_hash'),
      bio: readNullableString('user', row, 'bio'),
      avatar_url: readNullableString('user', row, 'avatar_url'),
      created_at: readTimestamp('user', row, 'created_at'),
      updated_at: readTimestamp('user', row, 'updated_at'),
    };
  },
};

export const ChallengeCollection: Collection<Challenge> = {
  name: 'challenge',

  validate(record) {
    validatePoints(record.points);
  },

  decode(row) {
    return {
      _id: readId('challenge', row),
      title: readString('challenge', row, 'title'),
      description: readString('challenge', row, 'description'),
      flag_hash: readString('challenge', row, 'flag_hash'),
      points: readInteger('challenge', row, 'points'),
      author: readString('challenge', row, 'author'),
      tags: readTags('challenge', row),
      is_active: readBoolean('challenge', row, 'is_active'),
      created_at: readTimestamp('challenge', row, 'created_at'),
      updated_at: readTimestamp('challenge', row, 'updated_at'),
    };
  },
};

export const SolveCollection: Collection<Solve> = {
  name: 'solve',

  validate(record) {
    validatePoints(record.points);
  },

  decode(row) {
    return {
      _id: readId('solve', row),
      challenge_id: readString('solve', row, 'challenge_id'),
      username: readString('solve', row, 'username'),
      points: readInteger('solve', row, 'points'),
      created_at: readTimestamp('solve', row, 'created_at'),
      updated_at: readTimestamp('solve', row, 'updated_at'),
    };
  },
};
