import { isValidEmail } from '../db/schemas.js';
import { Errors } from '../utils/errors.js';

export interface RegisterRequest {
  username: string;
  email: string;
  password: string;
}

export interface LoginRequest {
  username: string;
  password: string;
}

export interface ContributeChallengeRequest {
  title: string;
  description: string;
  flag: string;
  points: number;
  tags: string[] | null;
}

export interface SubmitFlagRequest {
  challenge_id: string;
  flag: string;
}

type Body = Record<string, unknown>;

// Both columns carry unique indexes, which cap the size of an entry
export const MAX_USERNAME_LENGTH = 255;
export const MAX_EMAIL_LENGTH = 320;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireBody(value: unknown): Body {
  if (!isBody(value)) {
    throw Errors.validation('Request body must be a JSON object');
  }
  return value;
}

function requireString(body: Body, field: string): string {
  const value = body[field];
  if (value === undefined || value === null) {
    throw Errors.validation(`${field} is required`, field);
  }
  if (typeof value !== 'string') {
    throw Errors.validation(`${field} must be a string`, field);
  }
  return value;
}

function requireBoundedString(body: Body, field: string, maxLength: number): string {
  const value = requireString(body, field);
  if (value.length > maxLength) {
    throw Errors.validation(`${field} must be at most ${maxLength} characters`, field);
  }
  return value;
}

function requireInteger(body: Body, field: string): number {
  const value = body[field];
  if (value === undefined || value === null) {
    throw Errors.validation(`${field} is required`, field);
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw Errors.validation(`${field} must be an integer`, field);
  }
  return value;
}

function optionalStringList(body: Body, field: string): string[] | null {
  const value = body[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw Errors.validation(`${field} must be a list of strings`, field);
  }
  return value;
}

export function parseRegisterRequest(input: unknown): RegisterRequest {
  const body = requireBody(input);
  const username = requireBoundedString(body, 'username', MAX_USERNAME_LENGTH);
  const email = requireBoundedString(body, 'email', MAX_EMAIL_LENGTH);
  if (!isValidEmail(email)) {
    throw Errors.validation('value is not a valid email address', 'email');
  }
  const password = requireString(body, 'password');

  return { username, email, password };
}

export function parseLoginRequest(input: unknown): LoginRequest {
  const body = requireBody(input);
  return {
    username: requireString(body, 'username'),
    password: requireString(body, 'password'),
  };
}

export function parseContributeChallengeRequest(input: unknown): ContributeChallengeRequest {
  const body = requireBody(input);
  return {
    title: requireString(body, 'title'),
    description: requireString(body, 'description'),
    flag: requireString(body, 'flag'),
    points: requireInteger(body, 'points'),
    tags: optionalStringList(body, 'tags'),
  };
}

export function parseSubmitFlagRequest(input: unknown): SubmitFlagRequest {
  const body = requireBody(input);
  return {
    challenge_id: requireString(body, 'challenge_id'),
    flag: requireString(body, 'flag'),
  };
}
