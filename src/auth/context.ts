/**
 * Identity Context
 *
 * Makes the current caller's identity and calling service available to
 * everything that runs inside a callback, across awaits, without threading
 * them through every signature.
 *
 * @example
 * ```typescript
 * await runWithIdentity(new BasicIdentity('user-123', IdentityType.User), async () => {
 *   await agent.start();
 *   requireIdentity().id; // 'user-123'
 * });
 * ```
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { unauthorized } from '../errors/index.js';
import type { Identity } from './identity.js';

interface CallerContext {
  identity?: Identity;
  callerService?: string;
}

const storage = new AsyncLocalStorage<CallerContext>();

/**
 * Run `fn` with `identity` as the current identity. The calling service, if
 * any, is inherited from the enclosing context.
 */
export function runWithIdentity<T>(identity: Identity, fn: () => T): T {
  return storage.run({ ...storage.getStore(), identity }, fn);
}

export function getIdentity(): Identity | undefined {
  return storage.getStore()?.identity;
}

/**
 * @throws {PlatformError} AUTH_001 when no identity is set
 */
export function requireIdentity(): Identity {
  const identity = getIdentity();
  if (!identity) {
    throw unauthorized('no identity in context; ensure authentication middleware is configured');
  }
  return identity;
}

/**
 * Run `fn` with `service` recorded as the calling service. The identity, if
 * any, is inherited from the enclosing context.
 */
export function runWithCallerService<T>(service: string, fn: () => T): T {
  return storage.run({ ...storage.getStore(), callerService: service }, fn);
}

export function getCallerService(): string | undefined {
  return storage.getStore()?.callerService;
}
