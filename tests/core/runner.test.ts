import { describe, it, expect, vi } from 'vitest';
import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { TidewatchConfig } from '../../src/core/config.js';
import { CycleOrchestrator, type CycleOutcome } from '../../src/core/cycle.js';
import {
  BackgroundRunner,
  describeStatus,
  nextDelaySeconds,
  type SleepFn,
} from '../../src/core/runner.js';
import { StateStore, createInitialState } from '../../src/agent/state/store.js';
import type { AgentParameters, AgentState } from '../../src/agent/state/types.js';
import { createCatalogRegistry } from '../../src/agent/tools/adapters/index.js';
import { quietLogger, testConfig } from '../helpers/context.js';

type Script = (previous: AgentState, call: number) => Promise<CycleOutcome>;

class ScriptedOrchestrator extends CycleOrchestrator {
  received: Array<AgentState | undefined> = [];

  constructor(
    config: TidewatchConfig,
    store: StateStore,
    private script: Script
  ) {
    super({
      config,
      store,
      oracle: { run: async () => ({ executions: [], rationale: '', steps: 0, truncated: false }) },
      registry: createCatalogRegistry(),
      logger: quietLogger,
    });
  }

  override async runCycle(initial?: AgentState, params: AgentParameters = {}): Promise<CycleOutcome> {
    this.received.push(initial);
    const previous = initial ?? createInitialState({ walletBalanceSol: 1, tradingMode: 'dry_run' });
    const parameters = { ...previous.parameters, ...params };
    return this.script({ ...previous, parameters }, this.received.length);
  }
}

function outcome(
  state: AgentState,
  status: CycleOutcome['status'] = 'completed',
  actions: string[] = ['get_wallet_balance']
): CycleOutcome {
  return {
    state: { ...state, cyclesCompleted: state.cyclesCompleted + 1 },
    phase: 'persisted',
    status,
    actions,
    executions: [],
    persisted: true,
    warnings: [],
  };
}

function setup(script: Script, runner: Partial<TidewatchConfig['runner']> = {}, sleep?: SleepFn) {
  const dir = mkdtempSync(join(tmpdir(), 'tidewatch-runner-'));
  const config = testConfig({ runner: { stopTimeoutMs: 1000, ...runner } });
  const store = new StateStore(join(dir, 'agent_state.json'), quietLogger);
  const orchestrator = new ScriptedOrchestrator(config, store, script);
  const instance = new BackgroundRunner(orchestrator, store, config, quietLogger, sleep);
  const stopped = new Promise<{ id: string; reason: string }>((resolve) => {
    instance.once('stopped', (id, reason) => resolve({ id, reason }));
  });
  return { runner: instance, orchestrator, store, config, stopped };
}

const instantSleep: SleepFn = async () => undefined;

describe('nextDelaySeconds', () => {
  const settings = testConfig().runner;
  const base = createInitialState({ walletBalanceSol: 1, tradingMode: 'dry_run' });

  it('backs off after errors and idle cycles', () => {
    expect(nextDelaySeconds(null, {}, settings)).toBe(600);
    expect(nextDelaySeconds(outcome(base, 'failed'), {}, settings)).toBe(600);
    expect(nextDelaySeconds(outcome(base, 'completed', []), {}, settings)).toBe(450);
    expect(nextDelaySeconds(outcome(base), {}, settings)).toBe(300);
  });

  it('never shortens a longer configured interval', () => {
    expect(nextDelaySeconds(outcome(base, 'completed', []), { cycleIntervalSeconds: 900 }, settings)).toBe(900);
    expect(nextDelaySeconds(outcome(base), { cycleIntervalSeconds: 60 }, settings)).toBe(60);
  });
});

describe('describeStatus', () => {
  const base = createInitialState({ walletBalanceSol: 1, tradingMode: 'dry_run' });
  const ran = { ...base, cyclesCompleted: 2 };

  it('labels the agent from its state', () => {
    expect(describeStatus(null, false)).toBe('initialized');
    expect(describeStatus(base, true)).toBe('initialized');
    expect(describeStatus({ ...ran, error: 'boom' }, true)).toBe('error');
    expect(describeStatus({ ...ran, healthy: false }, false)).toBe('error');
    expect(describeStatus(ran, false)).toBe('idle');
    expect(describeStatus(ran, true)).toBe('active');
    expect(describeStatus({ ...ran, positions: stateWithOnePosition().positions }, true)).toBe('trading');
  });
});

function stateWithOnePosition(): AgentState {
  return {
    ...createInitialState({ walletBalanceSol: 1, tradingMode: 'dry_run' }),
    positions: [
      {
        tokenAddress: 'HeldMint111',
        tokenSymbol: 'HELD',
        entryPriceUsd: 1,
        currentPriceUsd: 1,
        sizeSol: 0.1,
        unrealizedPnlSol: 0,
        openedAt: '2026-05-01T00:00:00.000Z',
        stopLossPct: 15,
        takeProfitPct: 50,
        reasoning: '',
        simulated: true,
      },
    ],
  };
}

describe('BackgroundRunner', () => {
  it('holds a single session slot and stops cleanly', async () => {
    const { runner, store, stopped } = setup(async (previous) => outcome(previous));
    const started = vi.fn();
    runner.on('started', started);

    expect(runner.start()).toBe(true);
    expect(runner.start()).toBe(false);
    expect(started).toHaveBeenCalledTimes(1);
    expect(store.load()?.sessionActive).toBe(true);

    await expect(runner.stop()).resolves.toBe(true);
    const { reason } = await stopped;

    expect(reason).toBe('aborted');
    expect(runner.running).toBe(false);
    expect(runner.status().sessionId).toBeNull();
    const persisted = store.load();
    expect(persisted?.sessionActive).toBe(false);
    expect(persisted?.sessionEndedAt).not.toBeNull();
  });

  it('returns true from stop when nothing is running', async () => {
    const { runner } = setup(async (previous) => outcome(previous));
    await expect(runner.stop()).resolves.toBe(true);
  });

  it('threads each cycle state into the next', async () => {
    const { runner, orchestrator, stopped } = setup(
      async (previous, call) =>
        outcome(call === 2 ? { ...previous, shouldStop: true } : previous),
      {},
      instantSleep
    );

    runner.start();
    const { reason } = await stopped;

    expect(reason).toBe('stop requested in state');
    expect(orchestrator.received).toHaveLength(2);
    expect(orchestrator.received[0]?.sessionActive).toBe(true);
    expect(orchestrator.received[1]?.cyclesCompleted).toBe(1);
  });

  it('opens the circuit after consecutive errored cycles', async () => {
    const { runner, orchestrator, stopped } = setup(
      async (previous) => outcome(previous, 'failed'),
      { maxConsecutiveErrors: 3 },
      instantSleep
    );
    const circuit = vi.fn();
    runner.on('circuit-open', circuit);

    runner.start();
    const { reason } = await stopped;

    expect(reason).toBe('circuit breaker: 3 consecutive errored cycles');
    expect(circuit).toHaveBeenCalledWith(3);
    expect(orchestrator.received).toHaveLength(3);
  });

  it('resets the error count after a clean cycle', async () => {
    const statuses: Array<CycleOutcome['status']> = ['failed', 'completed', 'failed', 'failed'];
    const { runner, orchestrator, stopped } = setup(
      async (previous, call) => outcome(previous, statuses[call - 1] ?? 'failed'),
      { maxConsecutiveErrors: 2 },
      instantSleep
    );

    runner.start();
    await stopped;

    expect(orchestrator.received).toHaveLength(4);
  });

  it('counts a thrown cycle as an errored one', async () => {
    const { runner, stopped } = setup(
      async () => {
        throw new Error('unexpected');
      },
      { maxConsecutiveErrors: 1 },
      instantSleep
    );
    const errors = vi.fn();
    runner.on('error', errors);

    runner.start();
    const { reason } = await stopped;

    expect(reason).toBe('circuit breaker: 1 consecutive errored cycles');
    expect(errors).toHaveBeenCalledTimes(1);
  });

  it('stops on a fatal error recorded in state', async () => {
    const { runner, stopped } = setup(
      async (previous) => outcome({ ...previous, fatalError: 'wallet drained' }),
      {},
      instantSleep
    );

    runner.start();
    await expect(stopped).resolves.toMatchObject({ reason: 'fatal error: wallet drained' });
  });

  it('sleeps between cycles in slices', async () => {
    const sleep = vi.fn<SleepFn>(async () => undefined);
    const { runner, stopped } = setup(
      async (previous, call) => outcome(call === 2 ? { ...previous, shouldStop: true } : previous),
      { sleepSliceMs: 1000 },
      sleep
    );

    runner.start({ cycleIntervalSeconds: 3 });
    await stopped;

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 1000, 1000]);
  });

  it('gives up waiting for a stuck worker after the timeout', async () => {
    const { runner } = setup(() => new Promise<CycleOutcome>(() => undefined), { stopTimeoutMs: 20 });

    runner.start();
    await expect(runner.stop()).resolves.toBe(false);
    expect(runner.status().workerAlive).toBe(true);
  });
});
