/**
 * tidewatch - Autonomous Solana Token-Trading Agent
 *
 * Main entry point for the tidewatch library.
 */

export { loadConfig, parseConfig, type TidewatchConfig } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { TidewatchAgent, type AgentOverrides } from './core/agent.js';
export {
  CycleOrchestrator,
  buildContext,
  type CycleOutcome,
  type CyclePhase,
  type CycleDependencies,
} from './core/cycle.js';
export {
  BackgroundRunner,
  type RunnerStatus,
  type RunnerSession,
  type RunnerEvents,
} from './core/runner.js';
export { AnthropicOracle, type ReasoningOracle, type OracleTurn, type OracleResult } from './core/llm.js';

export { StateStore, createInitialState } from './agent/state/store.js';
export {
  applyFill,
  computeMetrics,
  updatePortfolioMetrics,
  getStateSummary,
  type TradeFill,
} from './agent/state/portfolio.js';
export type { AgentState, Position, PortfolioMetrics, TradingMode } from './agent/state/types.js';

export { AgentToolRegistry } from './agent/tools/registry.js';
export { allTools, toolCatalog, createCatalogRegistry } from './agent/tools/adapters/index.js';
export type { ToolName, ToolResult, ToolContext, ToolExecution } from './agent/tools/types.js';

export { TransactionSubmitter, type SubmissionResult } from './execution/solana/submitter.js';
export { Web3Transport, DirectRpcTransport } from './execution/solana/transports.js';
export { SubmissionError, isTransientMessage } from './execution/errors.js';

export { EphemeralCache, sharedCache } from './memory/cache.js';
export { ExperienceStore } from './memory/experiences.js';

// Version
export const VERSION = '0.3.0';
