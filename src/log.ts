import createDebug from 'debug';

import type { InvalidOperationError } from './errors';

export const debugTask = createDebug('eager-task:task');
export const debugState = createDebug('eager-task:state');
export const debugAwaitable = createDebug('eager-task:awaitable');

/**
 * Log a usage error against its subject and hand it back for throwing
 */
export function misuse(subject: string, error: InvalidOperationError): InvalidOperationError {
  debugState('[%s] %s: %s', subject, error.code, error.message);
  return error;
}
