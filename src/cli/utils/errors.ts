/**
 * Prints an engine failure and yields the process exit code for it.
 */

import type { ServiceError } from '../../core/result';
import { red } from './terminal';

export function describeError(error: ServiceError): string {
  switch (error.kind) {
    case 'not_found':
      return `Unknown ${error.resource}: ${error.id}`;
    case 'conflict':
      return `The ${error.resource} ${error.id} changed while it was being updated (${error.attempts} attempts). Try again.`;
    case 'invalid_request':
      return error.message;
  }
}

export function printServiceError(error: ServiceError): number {
  console.log(red(`Error: ${describeError(error)}`));
  return 1;
}
