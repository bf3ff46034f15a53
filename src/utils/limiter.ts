export type Lane =
  | 'gemini_llm'
  | 'grobid'
  | 'crossref'
  | 'openalex'
  | 'semantic_scholar'
  | 'documents';

export interface LaneConfig {
  /** Maximum tasks running at once in the lane. */
  concurrency: number;
  /** Minimum spacing between task starts, shared by every caller of the lane. */
  minIntervalMs: number;
}

export interface LimiterClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const systemClock: LimiterClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

const defaultConfig: Record<Lane, LaneConfig> = {
  gemini_llm: { concurrency: 2, minIntervalMs: 0 },
  grobid: { concurrency: 2, minIntervalMs: 0 },
  crossref: { concurrency: 2, minIntervalMs: 100 },
  openalex: { concurrency: 2, minIntervalMs: 100 },
  semantic_scholar: { concurrency: 1, minIntervalMs: 1000 },
  documents: { concurrency: 4, minIntervalMs: 0 },
};

export class LaneLimiter {
  private queues: Map<Lane, Array<() => void>> = new Map();
  private running: Map<Lane, number> = new Map();
  private nextStartAt: Map<Lane, number> = new Map();
  private config: Record<Lane, LaneConfig>;

  constructor(
    config?: Partial<Record<Lane, Partial<LaneConfig>>>,
    private readonly clock: LimiterClock = systemClock
  ) {
    this.config = { ...defaultConfig };
    if (config) {
      for (const [lane, laneConfig] of Object.entries(config)) {
        if (isLane(lane) && laneConfig) {
          this.configure(lane, laneConfig);
        }
      }
    }
  }

  configure(lane: Lane, laneConfig: Partial<LaneConfig>): void {
    const merged = { ...this.config[lane], ...laneConfig };
    this.config[lane] = {
      concurrency: Math.max(1, Math.floor(merged.concurrency)),
      minIntervalMs: Math.max(0, merged.minIntervalMs),
    };
    this.processQueue(lane);
  }

  configFor(lane: Lane): LaneConfig {
    return { ...this.config[lane] };
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    await this.acquire(lane);
    try {
      await this.waitForSlot(lane);
      return await fn();
    } finally {
      this.running.set(lane, Math.max(0, (this.running.get(lane) ?? 1) - 1));
      this.processQueue(lane);
    }
  }

  private acquire(lane: Lane): Promise<void> {
    const running = this.running.get(lane) ?? 0;
    if (running < this.config[lane].concurrency) {
      this.running.set(lane, running + 1);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queueFor(lane).push(() => {
        this.running.set(lane, (this.running.get(lane) ?? 0) + 1);
        resolve();
      });
    });
  }

  // Start times are reserved synchronously, so concurrent callers never
  // claim the same slot.
  private async waitForSlot(lane: Lane): Promise<void> {
    const { minIntervalMs } = this.config[lane];
    if (minIntervalMs <= 0) return;
    const now = this.clock.now();
    const startAt = Math.max(now, this.nextStartAt.get(lane) ?? 0);
    this.nextStartAt.set(lane, startAt + minIntervalMs);
    if (startAt > now) {
      await this.clock.sleep(startAt - now);
    }
  }

  private queueFor(lane: Lane): Array<() => void> {
    let queue = this.queues.get(lane);
    if (!queue) {
      queue = [];
      this.queues.set(lane, queue);
    }
    return queue;
  }

  private processQueue(lane: Lane): void {
    const queue = this.queueFor(lane);
    while ((this.running.get(lane) ?? 0) < this.config[lane].concurrency) {
      const next = queue.shift();
      if (!next) break;
      next();
    }
  }
}

function isLane(value: string): value is Lane {
  return Object.prototype.hasOwnProperty.call(defaultConfig, value);
}

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  const parsed = raw === undefined ? NaN : Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const globalLimiter = new LaneLimiter({
  gemini_llm: { concurrency: envNumber('GEMINI_LLM_CONCURRENCY', 2) },
  semantic_scholar: { concurrency: envNumber('SS_CONCURRENCY', 1) },
});

export function limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
  return globalLimiter.limit(lane, fn);
}

/** Adjusts a process-wide lane. Every client sharing the lane sees the change. */
export function configureLane(lane: Lane, laneConfig: Partial<LaneConfig>): void {
  globalLimiter.configure(lane, laneConfig);
}
