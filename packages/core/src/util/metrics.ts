import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  ENUMERATE: 'enumerateMs',
  BUILD: 'buildMs',
  REDUCE: 'reduceMs',
  ANALYZE: 'analyzeMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;
export type MetricsVerbosity = 'runtime' | 'ci';

export interface MetricsSnapshot {
  enumerateMs: number;
  buildMs: number;
  reduceMs: number;
  analyzeMs: number;
  requiredPairs: number;
  candidatesBuilt: number;
  valuesScored: number;
  seedTestCases: number;
  testCasesDropped: number;
  // Newly covered pairs per greedy iteration, ci verbosity only
  iterationGains?: number[];
}

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  enumerateMs: 0,
  buildMs: 0,
  reduceMs: 0,
  analyzeMs: 0,
  requiredPairs: 0,
  candidatesBuilt: 0,
  valuesScored: 0,
  seedTestCases: 0,
  testCasesDropped: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  verbosity?: MetricsVerbosity;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private readonly snapshot: MetricsSnapshot;
  private readonly gains: number[] = [];
  private verbosity: MetricsVerbosity;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.verbosity = options.verbosity ?? 'runtime';
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      enumerateMs: { total: 0 },
      buildMs: { total: 0 },
      reduceMs: { total: 0 },
      analyzeMs: { total: 0 },
    };
  }

  public setVerbosity(mode: MetricsVerbosity): void {
    this.verbosity = mode;
  }

  public getVerbosity(): MetricsVerbosity {
    return this.verbosity;
  }

  public isVerbose(options: { verbosity?: MetricsVerbosity } = {}): boolean {
    const mode = options.verbosity ?? this.verbosity;
    return mode === 'ci';
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }

    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }

    this.accumulateDuration(key, this.now() - current.startedAt);
    this.timers[key] = { total: this.snapshot[key] };
  }

  /**
   * Time a synchronous section; the timer is closed even when it throws.
   */
  public measure<T>(phase: MetricPhase, run: () => T): T {
    this.begin(phase);
    try {
      return run();
    } finally {
      this.end(phase);
    }
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    this.accumulateDuration(METRIC_PHASES[phase], durationMs);
  }

  public setRequiredPairs(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.requiredPairs = count;
  }

  public addCandidate(gain: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.candidatesBuilt += 1;
    this.gains.push(gain);
  }

  public addValuesScored(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.valuesScored += count;
  }

  public addSeedTestCases(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.seedTestCases += count;
  }

  public addDroppedTestCases(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.testCasesDropped += count;
  }

  public snapshotMetrics(
    options: { verbosity?: MetricsVerbosity } = {}
  ): MetricsSnapshot {
    const mode = options.verbosity ?? this.verbosity;
    const basic: MetricsSnapshot = { ...this.snapshot };

    if (mode === 'ci') {
      basic.iterationGains = [...this.gains];
    }

    return basic;
  }

  private accumulateDuration(key: MetricsPhaseKey, durationMs: number): void {
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[key] += safeDuration;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
