/**
 * Runs tasks one at a time, in call order. A failed task does not block the
 * ones queued behind it.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve()

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task)
    this.tail = result.then(
      () => undefined,
      () => undefined
    )
    return result
  }

  /** Resolves once everything queued so far has settled. */
  idle(): Promise<void> {
    return this.tail
  }
}

/** One SerialLock per key; keys that are not in use hold no memory. */
export class KeyedLock {
  private readonly locks = new Map<string, { lock: SerialLock; pending: number }>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(key)
    if (!entry) {
      entry = { lock: new SerialLock(), pending: 0 }
      this.locks.set(key, entry)
    }
    const current = entry
    current.pending += 1
    return current.lock.run(task).finally(() => {
      current.pending -= 1
      if (current.pending === 0) this.locks.delete(key)
    })
  }

  get size(): number {
    return this.locks.size
  }
}
