/**
 * BackgroundWorkers - periodic task scheduler for the issuer daemon.
 *
 * Registers named worker tasks with intervals and handlers.
 * Prevents overlapping runs of the same worker, including manual runNow() calls.
 * Gracefully stops with timeout on in-progress handlers.
 *
 * Built-in workers (registered by IssuerLifecycle):
 * - settle: drain the redemption queue and forward excess (workers.settle_interval)
 * - wal-checkpoint: PASSIVE WAL checkpoint of the issuer database every 5 minutes
 *   (always registered: the settlement journal lives there whatever the queue storage)
 */

interface WorkerRegistration {
  name: string;
  interval: number; // ms
  handler: () => void | Promise<void>;
}

export interface BackgroundWorkersOptions {
  /** Called when a handler throws; defaults to console.error. */
  onError?: (name: string, err: unknown) => void;
}

export class BackgroundWorkers {
  private readonly registrations: Map<string, WorkerRegistration> = new Map();
  private readonly timers: Map<string, ReturnType<typeof setInterval>> = new Map();
  private readonly running: Map<string, boolean> = new Map();
  private readonly onError: (name: string, err: unknown) => void;

  constructor(options: BackgroundWorkersOptions = {}) {
    this.onError =
      options.onError ??
      ((name, err) => {
        console.error(`Worker ${name} error:`, err);
      });
  }

  /**
   * Register a named worker with an interval and handler.
   * Must be called before startAll().
   */
  register(name: string, opts: { interval: number; handler: () => void | Promise<void> }): void {
    if (!Number.isFinite(opts.interval) || opts.interval <= 0) {
      throw new Error(`Worker ${name}: interval must be a positive number of ms`);
    }
    this.registrations.set(name, { name, interval: opts.interval, handler: opts.handler });
  }

  /**
   * Start all registered workers. If a previous invocation is still running,
   * the next interval is skipped. Timers are unref'd so they don't prevent
   * process exit.
   */
  startAll(): void {
    for (const [name, registration] of this.registrations) {
      if (this.timers.has(name)) continue;
      this.running.set(name, false);

      const timer = setInterval(() => {
        void this.invoke(registration);
      }, registration.interval);

      timer.unref();
      this.timers.set(name, timer);
    }
  }

  /**
   * Run a worker immediately, outside its schedule.
   * @returns false if the worker is unknown or already running.
   */
  async runNow(name: string): Promise<boolean> {
    const registration = this.registrations.get(name);
    if (!registration) return false;
    return this.invoke(registration);
  }

  /**
   * Stop all workers. Clears intervals and waits up to `timeoutMs`
   * for any in-progress handlers to complete.
   */
  async stopAll(timeoutMs = 5000): Promise<void> {
    for (const [, timer] of this.timers) {
      clearInterval(timer);
    }
    this.timers.clear();

    const deadline = Date.now() + timeoutMs;
    while ([...this.running.values()].some(Boolean) && Date.now() < deadline) {
      await new Promise((r) => setTimeout(r, 20));
    }
  }

  get size(): number {
    return this.registrations.size;
  }

  isRunning(name: string): boolean {
    return this.running.get(name) ?? false;
  }

  private async invoke(registration: WorkerRegistration): Promise<boolean> {
    const { name } = registration;
    if (this.running.get(name)) return false;
    this.running.set(name, true);
    try {
      await registration.handler();
    } catch (err) {
      this.onError(name, err);
    } finally {
      this.running.set(name, false);
    }
    return true;
  }
}
