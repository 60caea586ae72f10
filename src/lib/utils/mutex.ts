/**
 * Async mutex serializing read-modify-write cycles on the JSON stores
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve()

  acquire<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.tail.then(operation)
    // the caller sees the rejection; the chain continues either way
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }
}

