import { TaskCancelledError } from 'cockatiel';
import { ExternalFetchError } from '../util/fetch.js';

export type TurnErrorCode =
  | 'ExtractionAmbiguous'
  | 'ValidationFailed'
  | 'UnknownIntent'
  | 'AdapterNotFound'
  | 'AdapterTransportError'
  | 'AdapterEmptyResult'
  | 'AdapterUnavailable';

export type ClassifierNoteCode = 'ClassifierUnavailable' | 'ClassifierFailed';

export interface TurnError {
  code: TurnErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export function turnError(code: TurnErrorCode, message: string, details?: Record<string, unknown>): TurnError {
  return details ? { code, message, details } : { code, message };
}

/**
 * Maps anything an adapter call can throw (fetch failures, timeouts, driver
 * errors) to the transport error of the turn.
 */
export function toTurnError(error: unknown, adapter: string): TurnError {
  if (error instanceof TaskCancelledError) {
    return turnError('AdapterTransportError', 'Request timeout', { adapter, kind: 'timeout' });
  }

  if (error instanceof ExternalFetchError) {
    return turnError('AdapterTransportError', error.message, {
      adapter,
      kind: error.kind,
      ...(error.status !== undefined ? { status: error.status } : {}),
    });
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return turnError('AdapterTransportError', 'Request timeout', { adapter, kind: 'timeout' });
    }
    return turnError('AdapterTransportError', error.message, { adapter, kind: 'network' });
  }

  return turnError('AdapterTransportError', 'Unknown error occurred', { adapter, kind: 'unknown' });
}
