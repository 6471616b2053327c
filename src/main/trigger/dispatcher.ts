export type Task = () => Promise<void>

export interface DispatcherOptions {
  maxConcurrent: number
  maxQueued: number
}

/**
 * Fire-and-forget runner with a cap on in-flight and waiting work. Tasks past
 * the queue limit are dropped, so a burst of triggers cannot pile up captures.
 */
export class TaskDispatcher {
  private running = 0
  private readonly queue: Array<{ name: string; task: Task }> = []
  private idleWaiters: Array<() => void> = []

  constructor(private readonly options: DispatcherOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${options.maxConcurrent}`)
    }
    if (!Number.isInteger(options.maxQueued) || options.maxQueued < 0) {
      throw new RangeError(`maxQueued must be a non-negative integer, got ${options.maxQueued}`)
    }
  }

  /** Returns false when the task was dropped. Never waits for the task. */
  dispatch(name: string, task: Task): boolean {
    if (this.running < this.options.maxConcurrent) {
      this.start(name, task)
      return true
    }

    if (this.queue.length < this.options.maxQueued) {
      this.queue.push({ name, task })
      return true
    }

    console.warn(`[TaskDispatcher] Dropped ${name}: ${this.running} running, ${this.queue.length} queued`)
    return false
  }

  get activeCount(): number {
    return this.running
  }

  get queuedCount(): number {
    return this.queue.length
  }

  /** Resolves once nothing is running or queued. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve)
    })
  }

  /** Waits for idle, but no longer than `timeoutMs`. Resolves false if work was still running. */
  async drain(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs)
    })

    try {
      return await Promise.race([this.onIdle().then(() => true), timedOut])
    } finally {
      clearTimeout(timer)
    }
  }

  private start(name: string, task: Task): void {
    this.running++
    void this.run(name, task)
  }

  private async run(name: string, task: Task): Promise<void> {
    try {
      await task()
    } catch (error) {
      console.error(`[TaskDispatcher] ${name} failed:`, error)
    } finally {
      this.running--
      const next = this.queue.shift()
      if (next) {
        this.start(next.name, next.task)
      } else if (this.running === 0) {
        const waiters = this.idleWaiters
        this.idleWaiters = []
        waiters.forEach((resolve) => resolve())
      }
    }
  }
}
