/**
 * Result type for service operations.
 *
 * Expected failures (unknown ids, write conflicts, requests that cannot apply)
 * are returned as values. Unexpected failures such as an unreachable database
 * are thrown and propagate to the caller unchanged.
 */

export type ResourceKind = 'learner' | 'course' | 'plan' | 'flashcard' | 'session';

export type ServiceError =
  | { kind: 'not_found'; resource: ResourceKind; id: string }
  | { kind: 'conflict'; resource: 'plan' | 'flashcard'; id: string; attempts: number }
  | { kind: 'invalid_request'; message: string };

export type Result<T, E = ServiceError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E = ServiceError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function notFound(resource: ResourceKind, id: string): Result<never, ServiceError> {
  return fail({ kind: 'not_found', resource, id });
}
