import axios from 'axios';
import { APIConnectionTimeoutError, APIError } from 'openai';

export type Collaborator = 'llm' | 'search' | 'image';

export type CollaboratorFailureKind = 'disabled' | 'unavailable' | 'timeout' | 'malformed' | 'empty';

export interface CollaboratorFailure {
  collaborator: Collaborator;
  kind: CollaboratorFailureKind;
  message: string;
  status?: number;
}

/**
 * Outcome of a call to an external service. Callers pick their fallback from the failure.
 */
export type CollaboratorResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CollaboratorFailure };

export function succeed<T>(value: T): CollaboratorResult<T> {
  return { ok: true, value };
}

export function failWith<T>(
  collaborator: Collaborator,
  kind: CollaboratorFailureKind,
  message: string,
  status?: number
): CollaboratorResult<T> {
  return { ok: false, error: { collaborator, kind, message, status } };
}

/**
 * Classify a thrown SDK/HTTP error into a collaborator failure
 */
export function describeFailure(collaborator: Collaborator, error: unknown): CollaboratorFailure {
  if (error instanceof APIConnectionTimeoutError) {
    return { collaborator, kind: 'timeout', message: error.message };
  }

  if (error instanceof APIError) {
    return { collaborator, kind: 'unavailable', message: error.message, status: error.status };
  }

  if (axios.isAxiosError(error)) {
    const kind = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' ? 'timeout' : 'unavailable';
    return { collaborator, kind, message: error.message, status: error.response?.status };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { collaborator, kind: 'unavailable', message };
}

/**
 * Raised when a reset or read targets a user without a conversation
 */
export class SessionNotFoundError extends Error {
  readonly userId: string;

  constructor(userId: string) {
    super(`No conversation found for user ${userId}`);
    this.name = 'SessionNotFoundError';
    this.userId = userId;
  }
}
