/**
 * Timeout utility for wrapping async operations with a timeout
 * @module services/resilience/timeout
 */

import { ServiceTimeoutError } from '../service-error'

/** Timer ID type for cross-environment compatibility */
type TimerId = ReturnType<typeof setTimeout>

/**
 * Options for the timeout wrapper
 */
export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  timeoutMs: number

  /** Service name for error messages */
  serviceName?: string

  /** Abort signal for external cancellation */
  signal?: AbortSignal
}

/**
 * Wraps a promise with a timeout
 *
 * @throws ServiceTimeoutError if the timeout is exceeded or the signal aborts
 *
 * @example
 * ```typescript
 * const result = await withTimeout(
 *   fetch('https://tags.example.org/mappings'),
 *   { timeoutMs: 5000, serviceName: 'tag-mapping' }
 * )
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, serviceName = 'unknown', signal } = options

  if (timeoutMs <= 0) {
    throw new Error('Timeout must be a positive number')
  }

  if (signal?.aborted) {
    throw new ServiceTimeoutError(serviceName, 0, {
      reason: 'Operation was aborted before starting',
    })
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false
    let timeoutId: TimerId | undefined

    const cleanup = () => {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId)
      }
      signal?.removeEventListener('abort', onAbort)
    }

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      cleanup()
      fn()
    }

    const onAbort = () =>
      settle(() =>
        reject(
          new ServiceTimeoutError(serviceName, timeoutMs, {
            reason: 'Operation was aborted',
          })
        )
      )

    timeoutId = setTimeout(
      () => settle(() => reject(new ServiceTimeoutError(serviceName, timeoutMs))),
      timeoutMs
    )
    signal?.addEventListener('abort', onAbort)

    promise.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error))
    )
  })
}

/**
 * Runs an abortable operation under a timeout.
 *
 * The operation receives a signal that fires when the timeout elapses, so
 * the underlying request is cancelled instead of left running. An already
 * aborted signal rejects without calling the operation.
 */
export async function withAbortableTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  // the operation must not start when the race is already lost
  if (options.timeoutMs <= 0) {
    throw new Error('Timeout must be a positive number')
  }
  if (options.signal?.aborted) {
    throw new ServiceTimeoutError(options.serviceName ?? 'unknown', 0, {
      reason: 'Operation was aborted before starting',
    })
  }

  const controller = new AbortController()
  const forwardAbort = () => controller.abort()
  options.signal?.addEventListener('abort', forwardAbort)

  try {
    return await withTimeout(operation(controller.signal), options)
  } finally {
    options.signal?.removeEventListener('abort', forwardAbort)
    // releases the underlying request once the race is decided
    controller.abort()
  }
}
