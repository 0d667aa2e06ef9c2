import type { CollectionOutcome } from '../domain/index.js';
import type { CollectionOrchestrator } from './collection-orchestrator.js';
import type { CollectorLogger } from './logger.js';

export type SchedulerState = 'stopped' | 'running' | 'stopping';

export interface PollingSchedulerOptions {
  enabled: boolean;
  intervalMs: number;
  log: CollectorLogger;
}

/**
 * Runs the orchestrator on a fixed interval as one background loop.
 *
 * State machine: stopped → running → stopping → stopped.
 *
 * `stop()` interrupts a pending wait immediately, but a cycle that is
 * already running is awaited to completion; store writes are never cut
 * short. Outcomes with errors are logged and the loop carries on; only
 * `stop()` ends it.
 *
 * `trigger()` runs a cycle on demand, independently of the loop.
 */
export class PollingScheduler {
  private readonly orchestrator: CollectionOrchestrator;
  private readonly options: PollingSchedulerOptions;
  private state: SchedulerState = 'stopped';
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(orchestrator: CollectionOrchestrator, options: PollingSchedulerOptions) {
    this.orchestrator = orchestrator;
    this.options = options;
  }

  getState(): SchedulerState {
    return this.state;
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  get intervalMs(): number {
    return this.options.intervalMs;
  }

  /**
   * Starts the poll loop. No-op when polling is disabled or the loop
   * is already running.
   */
  start(): void {
    const { log } = this.options;

    if (!this.options.enabled) {
      log.info('Background polling is disabled');
      return;
    }
    if (this.state !== 'stopped') return;

    const controller = new AbortController();
    this.controller = controller;
    this.state = 'running';

    log.info({ intervalMs: this.options.intervalMs }, 'Polling loop started');

    this.loop = this.run(controller.signal).catch((loopErr: unknown) => {
      // Unless a newer loop replaced this one
      if (this.controller === controller) {
        this.controller = null;
        this.state = 'stopped';
      }
      log.error({ err: loopErr }, 'Polling loop crashed');
    });
  }

  /**
   * Requests cancellation and resolves once the loop has exited.
   * Safe to call when already stopped.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return;

    this.state = 'stopping';
    this.controller?.abort();

    if (this.loop) {
      await this.loop;
    }

    this.loop = null;
    this.controller = null;
    this.state = 'stopped';
    this.options.log.info('Polling loop stopped');
  }

  /** Manual collection. Resolves with the cycle's outcome. */
  trigger(): Promise<CollectionOutcome> {
    this.options.log.info('Manual collection triggered');
    return this.orchestrator.runOnce();
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { log, intervalMs } = this.options;

    while (!signal.aborted) {
      const outcome = await this.orchestrator.runOnce();

      if (outcome.success) {
        log.info({ totalSaved: outcome.totalSaved }, 'Scheduled collection complete');
      } else {
        log.warn(
          { errors: outcome.errors, totalSaved: outcome.totalSaved },
          'Scheduled collection had errors',
        );
      }

      if (signal.aborted) break;

      log.debug({ intervalMs }, 'Waiting until next collection');
      await sleep(intervalMs, signal);
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}
