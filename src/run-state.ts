import { formatError } from './errors.js';
import { createCaptureLogger, silentLogger, type Logger } from './logger.js';

export const DEFAULT_RUN_TIMEOUT_MS = 300_000;

export type TriggerResult = { status: 'started' } | { status: 'already_running' };

export interface LastRun {
  started_at: string;
  finished_at: string;
  ok: boolean;
  error: string | null;
}

export interface RunStatus {
  running: boolean;
  started_at: string | null;
  last_run: LastRun | null;
}

export type ScanTask = (logger: Logger) => Promise<unknown>;

export interface ScanRunnerOptions {
  timeoutMs?: number;
  /** Receives every line as well as the capture buffer. */
  logger?: Logger;
  clock?: () => Date;
}

type Outcome = { ok: true } | { ok: false; error: string };

/**
 * Runs at most one scan at a time in the background. A second trigger while
 * one is in flight is refused rather than queued.
 */
export class ScanRunner {
  private readonly task: ScanTask;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private inFlight: Promise<void> | null = null;
  private startedAt: string | null = null;
  private lastRun: LastRun | null = null;
  private lines: string[] = [];

  constructor(task: ScanTask, opts: ScanRunnerOptions = {}) {
    this.task = task;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? (() => new Date());
  }

  trigger(): TriggerResult {
    if (this.inFlight) {
      return { status: 'already_running' };
    }

    const startedAt = this.clock().toISOString();
    this.startedAt = startedAt;
    this.lines = [];
    const logger = createCaptureLogger(this.lines, this.logger);

    this.inFlight = this.execute(logger, startedAt).finally(() => {
      this.inFlight = null;
      this.startedAt = null;
    });
    return { status: 'started' };
  }

  status(): RunStatus {
    return {
      running: this.inFlight !== null,
      started_at: this.startedAt,
      last_run: this.lastRun,
    };
  }

  /** Log lines of the current run, or of the last one when idle. */
  log(): string[] {
    return [...this.lines];
  }

  /** Resolves once no run is in flight. */
  async idle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private async execute(logger: Logger, startedAt: string): Promise<void> {
    const work: Promise<Outcome> = this.task(logger).then(
      () => ({ ok: true as const }),
      (err: unknown) => ({ ok: false as const, error: formatError(err) }),
    );

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.timeoutMs);
    });

    const first = await Promise.race([work, timeout]);
    clearTimeout(timer);

    if (first === 'timeout') {
      const message = `timed out after ${Math.round(this.timeoutMs / 1000)}s`;
      this.finish(startedAt, { ok: false, error: message });
      logger.error(`Scan ${message}`);
      // No cancellation: stay busy until the scan itself settles
      const settled = await work;
      logger.detail(`Timed-out scan settled (${settled.ok ? 'ok' : settled.error})`);
      return;
    }

    this.finish(startedAt, first);
    if (!first.ok) {
      logger.error(`Scan failed: ${first.error}`);
    }
  }

  private finish(startedAt: string, outcome: Outcome): void {
    this.lastRun = {
      started_at: startedAt,
      finished_at: this.clock().toISOString(),
      ok: outcome.ok,
      error: outcome.ok ? null : outcome.error,
    };
  }
}
