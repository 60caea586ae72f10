/**
 * Cooperative yield to the event loop.
 *
 * Lets pending I/O callbacks and cancellation requests run between
 * long-running processing steps.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}
