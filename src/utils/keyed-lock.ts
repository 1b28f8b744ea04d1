/**
 * Per-key mutual exclusion for async tasks
 *
 * Tasks sharing a key run one after another in call order; tasks with
 * different keys run freely. Used to make "is this branch checked out?"
 * and "add the worktree" one step per (base repository, branch) pair.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>()

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(() => task())
    // The chain must keep going whether this task resolves or rejects
    const tail = result.then(
      () => undefined,
      () => undefined
    )
    this.tails.set(key, tail)

    try {
      return await result
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}

/**
 * Key for the worktree critical section of one branch in one base repository
 */
export function worktreeLockKey(baseRepo: string, branch: string): string {
  return `${baseRepo}\u0000${branch}`
}

/**
 * Key for cloning one base repository; never equal to a worktree key
 */
export function provisionLockKey(baseRepo: string): string {
  return baseRepo
}

/**
 * Process-wide lock shared by every orchestrator
 */
export const worktreeLock = new KeyedLock()
