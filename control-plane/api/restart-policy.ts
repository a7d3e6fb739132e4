export interface RestartPolicyOptions {
  /** Delay before the first replacement */
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Consecutive early exits after which workers are no longer replaced */
  maxRapidExits?: number;
  /** A worker that ran at least this long counts as having started fine */
  stableAfterMs?: number;
}

export type RestartDecision =
  | { restart: true; delayMs: number }
  | { restart: false; rapidExits: number };

/**
* Decides whether the primary replaces a worker that exited, and after how
* long. Workers dying right after start (a taken port, a bad DATABASE_URL)
* back off exponentially and are given up on after `maxRapidExits`.
*/
export class WorkerRestartPolicy {
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly maxRapidExits: number;
  private readonly stableAfterMs: number;
  private rapidExits = 0;

  constructor(options: RestartPolicyOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30000;
    this.maxRapidExits = options.maxRapidExits ?? 5;
    this.stableAfterMs = options.stableAfterMs ?? 10000;
  }

  onExit(uptimeMs: number): RestartDecision {
    this.rapidExits = uptimeMs >= this.stableAfterMs ? 0 : this.rapidExits + 1;

    if (this.rapidExits >= this.maxRapidExits) {
      return { restart: false, rapidExits: this.rapidExits };
    }
    const backoff = this.baseDelayMs * Math.pow(2, Math.max(0, this.rapidExits - 1));
    return { restart: true, delayMs: Math.min(backoff, this.maxDelayMs) };
  }
}
