import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { Logger } from '../../core/logger.js';
import {
  AgentStateSchema,
  REQUIRED_STATE_FIELDS,
  type AgentState,
  type TradingMode,
} from './types.js';
import { updatePortfolioMetrics } from './portfolio.js';

export interface InitialStateOptions {
  walletBalanceSol: number;
  tradingMode: TradingMode;
}

export function createInitialState(options: InitialStateOptions): AgentState {
  return updatePortfolioMetrics(
    AgentStateSchema.parse({
      walletBalanceSol: options.walletBalanceSol,
      tradingMode: options.tradingMode,
    })
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON file store for the agent's world state. The document is always
 * written whole: serialized to a sibling temp file, then renamed over the
 * target.
 */
export class StateStore {
  private logger: Logger;

  constructor(
    readonly path: string,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('info', 'state');
  }

  /**
   * Read the persisted state. Returns null when there is nothing usable on
   * disk; never throws.
   */
  load(): AgentState | null {
    if (!existsSync(this.path)) {
      return null;
    }
    try {
      const raw: unknown = JSON.parse(readFileSync(this.path, 'utf-8'));
      if (!this.validate(raw)) {
        this.logger.warn(`State at ${this.path} is missing required fields; migrating`);
      }
      return this.migrate(raw);
    } catch (error) {
      this.logger.error(`Failed to load state from ${this.path}`, error);
      return null;
    }
  }

  save(state: AgentState): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
    renameSync(tmpPath, this.path);
  }

  validate(raw: unknown): boolean {
    if (!isRecord(raw)) return false;
    return REQUIRED_STATE_FIELDS.every((field) => field in raw);
  }

  /**
   * Bring a document of any vintage up to the current shape. Missing or
   * ill-typed fields take their defaults; unknown keys are kept. A list entry
   * is dropped only when it lacks its identity (a position's token address,
   * say), and each drop is logged.
   */
  migrate(raw: unknown): AgentState {
    const source = isRecord(raw) ? raw : {};
    const state = AgentStateSchema.parse(source);
    for (const list of ['positions', 'tradeHistory', 'errorHistory'] as const) {
      const before = source[list];
      const dropped = Array.isArray(before) ? before.length - state[list].length : 0;
      if (dropped > 0) {
        this.logger.warn(
          `Migration dropped ${dropped} unreadable ${dropped === 1 ? 'entry' : 'entries'} from ${list}`
        );
      }
    }
    return state;
  }
}
