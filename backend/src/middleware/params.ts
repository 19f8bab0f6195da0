import { DEFAULT_SESSION_ID } from '../services/sessionStore.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Session id from a body or query value. Absent -> "default"; present but not a
 * non-empty string -> 400.
 */
export function readSessionId(value: unknown): string {
  if (value === undefined || value === null) return DEFAULT_SESSION_ID;
  if (typeof value !== 'string' || !value.trim()) {
    throw new ValidationError('session_id must be a non-empty string');
  }
  return value.trim();
}

export function readRequiredString(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new ValidationError(`${field} is required`);
  }
  return value;
}
