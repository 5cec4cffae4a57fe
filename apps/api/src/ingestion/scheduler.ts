import { errorMessage } from '../errors.js';
import type { Logger } from '../types.js';
import type { IngestionRunner } from './pipeline.js';

export const DEFAULT_INTERVAL_MS = 60_000;

export interface IngestionSchedulerOptions {
  intervalMs?: number;
  logger?: Logger;
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Runs the ingestion pipeline immediately and then once per interval until stopped.
 *
 * A failing run is logged and the loop carries on. Runs never overlap within one scheduler:
 * the next sleep starts only after the previous run settles.
 */
export class IngestionScheduler {
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly runner: IngestionRunner, options: IngestionSchedulerOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.logger = options.logger ?? console;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal);
  }

  /** Cancels the pending sleep and any in-flight fetch, then waits for the loop to exit. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    await loop;
    this.loop = null;
    this.controller = null;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.tick(signal);
      if (signal.aborted) break;
      await sleep(this.intervalMs, signal);
    }
  }

  private async tick(signal: AbortSignal): Promise<void> {
    try {
      const added = await this.runner.runOnce(signal);
      this.logger.info(`[scheduler] Crawled ${added} new apartments at ${new Date().toISOString()}`);
    } catch (err) {
      this.logger.error('[scheduler] Error during crawling', { error: errorMessage(err) });
    }
  }
}
