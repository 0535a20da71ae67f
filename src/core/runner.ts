/**
 * Background Runner
 *
 * Loops the cycle orchestrator in one background session per process:
 * - compare-and-swap session slot
 * - circuit breaker on consecutive errored cycles
 * - adaptive, abortable sleep between cycles
 */

import { randomUUID } from 'node:crypto';

import { EventEmitter } from 'eventemitter3';

import type { TidewatchConfig } from './config.js';
import type { CycleOrchestrator, CycleOutcome } from './cycle.js';
import { Logger, toErrorMessage } from './logger.js';
import { createInitialState, type StateStore } from '../agent/state/store.js';
import type { AgentParameters, AgentState, TradingMode } from '../agent/state/types.js';

export interface RunnerSession {
  id: string;
  controller: AbortController;
  done: Promise<void>;
}

export type RunnerStatusLabel = 'error' | 'initialized' | 'idle' | 'trading' | 'active';

export interface RunnerStatus {
  running: boolean;
  workerAlive: boolean;
  sessionId: string | null;
  cyclesCompleted: number;
  walletBalanceSol: number;
  positionCount: number;
  lastActions: string[];
  healthy: boolean;
  currentError: string | null;
  tradingMode: TradingMode;
  consecutiveErrors: number;
  status: RunnerStatusLabel;
}

export interface RunnerEvents {
  started: (sessionId: string) => void;
  cycle: (outcome: CycleOutcome) => void;
  'circuit-open': (consecutiveErrors: number) => void;
  stopped: (sessionId: string, reason: string) => void;
  error: (error: Error) => void;
}

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

/**
 * Resolve after `ms`, or as soon as `signal` aborts.
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

type RunnerSettings = TidewatchConfig['runner'];

/**
 * Seconds to wait before the next cycle.
 */
export function nextDelaySeconds(
  outcome: Pick<CycleOutcome, 'status' | 'actions'> | null,
  parameters: AgentParameters,
  settings: RunnerSettings
): number {
  let delay = parameters.cycleIntervalSeconds ?? settings.cycleIntervalSeconds;
  if (!outcome || outcome.status === 'failed') {
    delay = Math.max(delay, settings.errorBackoffSeconds);
  } else if (outcome.actions.length === 0) {
    delay = Math.max(delay, settings.idleBackoffSeconds);
  }
  return delay;
}

export function describeStatus(state: AgentState | null, running: boolean): RunnerStatusLabel {
  if (!state) return 'initialized';
  if (state.error || !state.healthy) return 'error';
  if (state.cyclesCompleted === 0) return 'initialized';
  if (!running) return 'idle';
  return state.positions.length > 0 ? 'trading' : 'active';
}

export class BackgroundRunner extends EventEmitter<RunnerEvents> {
  private session: RunnerSession | null = null;
  private workerAlive = false;
  private consecutiveErrors = 0;
  private latest: AgentState | null = null;
  private logger: Logger;
  private settings: RunnerSettings;

  constructor(
    private orchestrator: CycleOrchestrator,
    private store: StateStore,
    private config: TidewatchConfig,
    logger?: Logger,
    private sleep: SleepFn = abortableSleep
  ) {
    super();
    this.settings = config.runner;
    this.logger = logger ?? new Logger('info', 'runner');
  }

  get running(): boolean {
    return this.session !== null;
  }

  /**
   * Claim the session slot and start the worker. False if a session is
   * already running.
   */
  start(params: AgentParameters = {}): boolean {
    if (this.session) {
      this.logger.warn(`Runner already active (session ${this.session.id})`);
      return false;
    }

    const id = randomUUID();
    const controller = new AbortController();
    let resolveDone: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      resolveDone = resolve;
    });
    this.session = { id, controller, done };
    this.consecutiveErrors = 0;

    try {
      const loaded =
        this.store.load() ??
        createInitialState({
          walletBalanceSol: this.config.trading.initialBalanceSol,
          tradingMode: this.config.trading.mode,
        });
      this.latest = {
        ...loaded,
        sessionActive: true,
        sessionId: id,
        shouldStop: false,
        fatalError: null,
      };
      this.store.save(this.latest);
    } catch (error) {
      this.logger.warn(`Could not mark session start in state: ${toErrorMessage(error)}`);
    }

    this.workerAlive = true;
    this.emit('started', id);
    this.logger.info(`Runner started (session ${id})`);

    void this.loop(id, controller.signal, params)
      .catch((error: unknown) => {
        this.logger.error('Runner worker crashed', error);
        this.emit('error', error instanceof Error ? error : new Error(toErrorMessage(error)));
      })
      .finally(() => {
        this.workerAlive = false;
        if (this.session?.id === id) {
          this.session = null;
        }
        resolveDone();
      });

    return true;
  }

  /**
   * Ask the worker to stop and wait for it. True once stopped (or when
   * nothing was running); false if it did not stop within the timeout.
   */
  async stop(): Promise<boolean> {
    const session = this.session;
    if (!session) {
      return true;
    }

    session.controller.abort();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.settings.stopTimeoutMs);
    });
    const stopped = await Promise.race([session.done.then(() => true as const), timedOut]);
    clearTimeout(timer);

    if (!stopped) {
      this.logger.warn(
        `Runner session ${session.id} did not stop within ${this.settings.stopTimeoutMs}ms`
      );
    }
    return stopped;
  }

  status(): RunnerStatus {
    const state = this.latest ?? this.store.load();
    return {
      running: this.running,
      workerAlive: this.workerAlive,
      sessionId: this.session?.id ?? null,
      cyclesCompleted: state?.cyclesCompleted ?? 0,
      walletBalanceSol: state?.walletBalanceSol ?? 0,
      positionCount: state?.positions.length ?? 0,
      lastActions: [...(state?.lastActions ?? [])],
      healthy: state?.healthy ?? true,
      currentError: state?.error ?? null,
      tradingMode: state?.tradingMode ?? 'dry_run',
      consecutiveErrors: this.consecutiveErrors,
      status: describeStatus(state, this.running),
    };
  }

  private async loop(id: string, signal: AbortSignal, params: AgentParameters): Promise<void> {
    let state: AgentState | undefined = this.latest ?? undefined;
    let reason = 'aborted';

    while (!signal.aborted) {
      let outcome: CycleOutcome | null = null;
      try {
        outcome = await this.orchestrator.runCycle(state, params);
        state = outcome.state;
        this.latest = outcome.state;
        this.emit('cycle', outcome);
      } catch (error) {
        this.logger.error('Cycle threw unexpectedly', error);
        this.emit('error', error instanceof Error ? error : new Error(toErrorMessage(error)));
      }

      if (!outcome || outcome.status === 'failed') {
        this.consecutiveErrors += 1;
      } else {
        this.consecutiveErrors = 0;
      }

      if (this.consecutiveErrors >= this.settings.maxConsecutiveErrors) {
        reason = `circuit breaker: ${this.consecutiveErrors} consecutive errored cycles`;
        this.logger.error(`Stopping runner, ${reason}`);
        this.emit('circuit-open', this.consecutiveErrors);
        break;
      }
      if (state?.shouldStop) {
        reason = 'stop requested in state';
        break;
      }
      if (state?.fatalError) {
        reason = `fatal error: ${state.fatalError}`;
        break;
      }
      if (signal.aborted) break;

      const delaySeconds = nextDelaySeconds(outcome, state?.parameters ?? params, this.settings);
      this.logger.info(`Next cycle in ${delaySeconds}s`);
      await this.sleepInSlices(delaySeconds * 1000, signal);
    }

    this.finishSession(id, reason);
  }

  private async sleepInSlices(totalMs: number, signal: AbortSignal): Promise<void> {
    let remaining = totalMs;
    while (remaining > 0 && !signal.aborted) {
      const slice = Math.min(this.settings.sleepSliceMs, remaining);
      await this.sleep(slice, signal);
      remaining -= slice;
    }
  }

  private finishSession(id: string, reason: string): void {
    const base = this.latest ?? this.store.load();
    if (base) {
      const ended: AgentState = {
        ...base,
        sessionActive: false,
        sessionEndedAt: new Date().toISOString(),
      };
      this.latest = ended;
      try {
        this.store.save(ended);
      } catch (error) {
        this.logger.error(`Could not persist session end: ${toErrorMessage(error)}`);
      }
    }
    this.logger.info(`Runner stopped (session ${id}): ${reason}`);
    this.emit('stopped', id, reason);
  }
}
