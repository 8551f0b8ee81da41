/**
 * Correlation Context
 *
 * Propagates a correlation ID through every async continuation of an
 * issuance operation so that its log lines and errors can be tied together.
 */

import { v4 as uuidv4 } from 'uuid';
import { createNamespace, getNamespace } from 'cls-hooked';

const NAMESPACE_NAME = 'keymint.correlation';

const namespace = getNamespace(NAMESPACE_NAME) ?? createNamespace(NAMESPACE_NAME);

export interface CorrelationContext {
  correlationId: string;
  operation?: string;
}

/**
 * Get current correlation ID from async context
 */
export function getCorrelationId(): string | undefined {
  if (!namespace.active) {
    return undefined;
  }
  const value: unknown = namespace.get('correlationId');
  return typeof value === 'string' ? value : undefined;
}

/**
 * Get the full correlation context, if one is active
 */
export function getCorrelationContext(): CorrelationContext | undefined {
  const correlationId = getCorrelationId();
  if (!correlationId) {
    return undefined;
  }
  const operation: unknown = namespace.get('operation');
  return {
    correlationId,
    ...(typeof operation === 'string' && { operation }),
  };
}

/**
 * Run an async function within a correlation context. An operation that
 * is already inside a context keeps the outer correlation ID.
 */
export async function runWithCorrelationAsync<T>(
  operation: string,
  fn: () => Promise<T>,
  correlationId: string = getCorrelationId() ?? uuidv4()
): Promise<T> {
  return namespace.runAndReturn(async () => {
    namespace.set('correlationId', correlationId);
    namespace.set('operation', operation);
    return await fn();
  });
}
