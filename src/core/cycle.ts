/**
 * Cycle Orchestrator
 *
 * One decision-execution cycle: build the context, let the oracle act
 * through the catalog, fold the resulting trades into the state and
 * persist. A cycle never throws; every failure ends in a persisted state
 * that names it.
 */

import type { TidewatchConfig } from './config.js';
import type { ReasoningOracle } from './llm.js';
import { Logger, toErrorMessage } from './logger.js';
import type { AgentToolRegistry } from '../agent/tools/registry.js';
import type { ToolContext, ToolExecution } from '../agent/tools/types.js';
import {
  applyFill,
  applyPrices,
  positionValueSol,
  updatePortfolioMetrics,
  type FillLimits,
  type TradeFill,
} from '../agent/state/portfolio.js';
import { createInitialState, type StateStore } from '../agent/state/store.js';
import type { AgentParameters, AgentState } from '../agent/state/types.js';
import type { PriceFeed } from '../intel/prices.js';

export type CyclePhase =
  | 'idle'
  | 'context_built'
  | 'oracle_invoked'
  | 'actions_executed'
  | 'persisted'
  | 'failed';

export type CycleErrorType = 'context_failure' | 'oracle_failure' | 'execution_failure';

export interface CycleOutcome {
  state: AgentState;
  /** Last phase reached */
  phase: CyclePhase;
  status: 'completed' | 'failed';
  actions: string[];
  executions: ToolExecution[];
  persisted: boolean;
  warnings: string[];
  error?: string;
  errorType?: CycleErrorType;
}

/** Collaborators handed to every tool, minus what the cycle fills in. */
export type ToolCollaborators = Omit<ToolContext, 'config' | 'tradingMode' | 'getState' | 'recordFill'>;

export interface CycleDependencies {
  config: TidewatchConfig;
  store: StateStore;
  oracle: ReasoningOracle;
  registry: AgentToolRegistry;
  collaborators?: ToolCollaborators;
  priceFeed?: PriceFeed;
  logger?: Logger;
  now?: () => Date;
}

export const DISENGAGED_WARNING = 'Oracle invoked no actions this cycle';

class CycleFailure extends Error {
  constructor(
    readonly type: CycleErrorType,
    cause: unknown
  ) {
    super(toErrorMessage(cause));
    this.name = 'CycleFailure';
  }
}

/**
 * The document the oracle sees at the start of a cycle.
 */
export function buildContext(state: AgentState, objectives: string[]): string {
  const m = state.metrics;
  const lines = [
    `# Trading cycle ${state.cyclesCompleted + 1}`,
    '',
    `Trading mode: ${state.tradingMode}${state.tradingMode === 'dry_run' ? ' (trades are simulated)' : ' (trades are REAL)'}`,
    `Wallet balance: ${state.walletBalanceSol.toFixed(4)} SOL`,
    `Portfolio value: ${m.totalValueSol.toFixed(4)} SOL`,
    `Cash allocation: ${m.cashAllocationPct.toFixed(1)}%`,
    `Realized P&L: ${m.realizedPnlSol.toFixed(4)} SOL`,
    `Cycles completed: ${state.cyclesCompleted}`,
    '',
  ];

  if (state.positions.length === 0) {
    lines.push('Open positions: none');
  } else {
    lines.push(`Open positions (${state.positions.length}):`);
    for (const p of state.positions) {
      lines.push(
        `- ${p.tokenSymbol} ${p.tokenAddress}: ${p.sizeSol.toFixed(4)} SOL in, ` +
          `now ${positionValueSol(p).toFixed(4)} SOL, entry $${p.entryPriceUsd}, ` +
          `current $${p.currentPriceUsd}, stop -${p.stopLossPct}%, target +${p.takeProfitPct}%` +
          (p.simulated ? ' [simulated]' : '')
      );
    }
  }

  lines.push(
    '',
    `Previous cycle actions: ${state.lastActions.length > 0 ? state.lastActions.join(', ') : 'none'}`
  );
  if (state.errorHistory.length > 0) {
    const last = state.errorHistory[state.errorHistory.length - 1];
    if (last) lines.push(`Last error: ${last.message}`);
  }

  lines.push('', 'Objectives:', ...objectives.map((objective, i) => `${i + 1}. ${objective}`));
  return lines.join('\n');
}

export class CycleOrchestrator {
  private logger: Logger;
  private now: () => Date;

  constructor(private deps: CycleDependencies) {
    this.logger = deps.logger ?? new Logger('info', 'cycle');
    this.now = deps.now ?? (() => new Date());
  }

  async runCycle(initial?: AgentState, params: AgentParameters = {}): Promise<CycleOutcome> {
    const { config } = this.deps;
    const limits: FillLimits = {
      tradeHistoryLimit: config.state.tradeHistoryLimit,
      stopLossPct: config.trading.stopLossPct,
      takeProfitPct: config.trading.takeProfitPct,
    };
    const warnings: string[] = [];
    const executions: ToolExecution[] = [];
    const fills: TradeFill[] = [];
    let phase: CyclePhase = 'idle';
    let failure: CycleFailure | null = null;
    let rationale: string | null = null;

    let state = initial ?? this.deps.store.load() ?? this.initialState();
    const withFills = (base: AgentState): AgentState =>
      updatePortfolioMetrics(fills.reduce((s, fill) => applyFill(s, fill, limits), base));

    let context = '';
    try {
      state = this.archiveError(this.mergeParameters(state, params));
      state = await this.refreshPrices(state, warnings);
      state = updatePortfolioMetrics(state);
      context = buildContext(state, state.parameters.objectives ?? config.agent.objectives);
      phase = 'context_built';
    } catch (error) {
      failure = new CycleFailure('context_failure', error);
    }

    if (!failure) {
      const base = state;
      const ctx: ToolContext = {
        ...this.deps.collaborators,
        config,
        tradingMode: base.tradingMode,
        logger: this.deps.collaborators?.logger ?? this.logger,
        getState: () => withFills(base),
        recordFill: (fill) => {
          fills.push(fill);
        },
      };

      try {
        const result = await this.deps.oracle.run({
          context,
          tools: this.deps.registry.getLlmSchemas(),
          maxSteps: base.parameters.maxSteps ?? config.agent.maxSteps,
          dispatch: async (name, input) => {
            const execution = await this.deps.registry.execute(name, input, ctx);
            executions.push(execution);
            return execution;
          },
        });
        rationale = result.rationale;
        if (result.truncated) {
          warnings.push(`Oracle step budget exhausted after ${result.steps} steps`);
        }
        phase = 'oracle_invoked';
      } catch (error) {
        failure = new CycleFailure('oracle_failure', error);
      }
    }

    // Trades that went out must be booked even when the oracle failed afterwards.
    try {
      state = withFills(state);
      if (!failure) phase = 'actions_executed';
    } catch (error) {
      failure ??= new CycleFailure('execution_failure', error);
    }

    const actions = executions.map((execution) => execution.toolName);
    state = this.finish(state, { actions, rationale, failure, warnings });
    if (failure) {
      phase = 'failed';
      this.logger.error(`Cycle ${state.cyclesCompleted} failed (${failure.type}): ${failure.message}`);
    }

    let persisted = false;
    try {
      this.deps.store.save(state);
      persisted = true;
      phase = 'persisted';
    } catch (error) {
      const message = `State save failed: ${toErrorMessage(error)}`;
      this.logger.error(message);
      warnings.push(message);
    }

    if (!failure) {
      this.logger.info(
        `Cycle ${state.cyclesCompleted} completed: ${actions.length} action(s), ${fills.length} trade(s)`
      );
    }

    return {
      state,
      phase,
      status: failure ? 'failed' : 'completed',
      actions,
      executions,
      persisted,
      warnings,
      ...(failure ? { error: failure.message, errorType: failure.type } : {}),
    };
  }

  private initialState(): AgentState {
    return createInitialState({
      walletBalanceSol: this.deps.config.trading.initialBalanceSol,
      tradingMode: this.deps.config.trading.mode,
    });
  }

  private mergeParameters(state: AgentState, params: AgentParameters): AgentState {
    const parameters = { ...state.parameters, ...params };
    const tradingMode =
      params.dryRun === undefined ? state.tradingMode : params.dryRun ? 'dry_run' : 'live';
    return { ...state, parameters, tradingMode };
  }

  private archiveError(state: AgentState): AgentState {
    if (!state.error) return state;
    const record = {
      message: state.error,
      type: state.errorType,
      timestamp: state.errorTimestamp,
      cycle: state.cyclesCompleted,
    };
    return {
      ...state,
      errorHistory: [...state.errorHistory, record].slice(-this.deps.config.state.errorHistoryLimit),
      error: null,
      errorTimestamp: null,
      errorType: null,
    };
  }

  private async refreshPrices(state: AgentState, warnings: string[]): Promise<AgentState> {
    const feed = this.deps.priceFeed;
    if (!feed || state.positions.length === 0) return state;
    const addresses = [...new Set(state.positions.map((p) => p.tokenAddress))];
    try {
      return applyPrices(state, await feed.getPrices(addresses));
    } catch (error) {
      const message = `Price refresh failed: ${toErrorMessage(error)}`;
      this.logger.warn(message);
      warnings.push(message);
      return state;
    }
  }

  private finish(
    state: AgentState,
    outcome: {
      actions: string[];
      rationale: string | null;
      failure: CycleFailure | null;
      warnings: string[];
    }
  ): AgentState {
    const timestamp = this.now().toISOString();
    const next: AgentState = {
      ...state,
      lastActions: outcome.actions,
      lastRationale: outcome.rationale,
      cyclesCompleted: state.cyclesCompleted + 1,
      lastUpdate: timestamp,
      healthy: outcome.failure === null,
    };

    if (outcome.failure) {
      return {
        ...next,
        error: outcome.failure.message,
        errorTimestamp: timestamp,
        errorType: outcome.failure.type,
        qualityWarning: null,
      };
    }

    if (outcome.actions.length === 0) {
      outcome.warnings.push(DISENGAGED_WARNING);
      this.logger.warn(DISENGAGED_WARNING);
      return { ...next, qualityWarning: DISENGAGED_WARNING };
    }
    return { ...next, qualityWarning: null };
  }
}
