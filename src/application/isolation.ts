import type { Logger } from 'pino';
import type { AnalyticsBackend, BackendCall } from '../domain/index.js';

/** Name used in log lines: explicit `name`, else the class name. */
export function backendLabel(backend: AnalyticsBackend): string {
  if (backend.name) return backend.name;
  const ctorName = backend.constructor?.name;
  return ctorName && ctorName !== 'Object' ? ctorName : 'anonymous';
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object'
    && value !== null
    && 'then' in value
    && typeof value.then === 'function';
}

/**
 * Runs one backend entry point so that its failure stays local.
 *
 * A synchronous throw is caught and logged. A returned thenable (native,
 * foreign-realm or hand-rolled) is not awaited; its rejection is caught
 * and logged when it settles.
 */
export function invokeIsolated(
  log: Logger,
  backend: AnalyticsBackend,
  call: BackendCall,
  invoke: () => unknown,
): void {
  try {
    const result = invoke();
    if (isThenable(result)) {
      void Promise.resolve(result).catch((err: unknown) => {
        log.warn({ err, backend: backendLabel(backend), call }, 'Analytics backend call rejected');
      });
    }
  } catch (err: unknown) {
    log.warn({ err, backend: backendLabel(backend), call }, 'Analytics backend call failed');
  }
}
