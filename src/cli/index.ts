#!/usr/bin/env node
import 'dotenv/config';
/**
 * tidewatch CLI
 *
 * Run trading cycles, the background runner, and inspect or repair the
 * persisted agent state.
 */

import { existsSync, readFileSync } from 'node:fs';

import { Command, Option } from 'commander';

import { VERSION } from '../index.js';
import { loadConfig, type TidewatchConfig } from '../core/config.js';
import { TidewatchAgent } from '../core/agent.js';
import type { CycleOutcome } from '../core/cycle.js';
import { Logger, toErrorMessage } from '../core/logger.js';
import { getStateSummary } from '../agent/state/portfolio.js';
import { StateStore, createInitialState } from '../agent/state/store.js';
import { createCatalogRegistry } from '../agent/tools/adapters/index.js';
import { TOOL_CATEGORIES } from '../agent/tools/types.js';

function formatToolTrace(outcome: CycleOutcome): string {
  if (outcome.executions.length === 0) {
    return 'No tools called.';
  }
  const lines: string[] = [];
  for (const exec of outcome.executions) {
    const status = exec.result.success ? 'SUCCESS' : 'FAILED';
    const detail = exec.result.success ? '' : ` (${exec.result.error})`;
    lines.push(`- ${exec.toolName} [${status}]${detail}`);
  }
  return lines.join('\n');
}

function printOutcome(outcome: CycleOutcome): void {
  console.log(`Cycle ${outcome.state.cyclesCompleted}: ${outcome.status} (phase ${outcome.phase})`);
  console.log(formatToolTrace(outcome));
  if (outcome.state.lastRationale) {
    console.log(`\nRationale:\n${outcome.state.lastRationale}`);
  }
  if (outcome.error) {
    console.log(`\nError (${outcome.errorType ?? 'unknown'}): ${outcome.error}`);
  }
  for (const warning of outcome.warnings) {
    console.log(`Warning: ${warning}`);
  }
  console.log(`\n${getStateSummary(outcome.state)}`);
}

function resolveDryRun(options: { live?: boolean; dryRun?: boolean }, config: TidewatchConfig): boolean {
  if (options.live && options.dryRun) {
    throw new Error('--live and --dry-run are mutually exclusive');
  }
  if (options.live) return false;
  if (options.dryRun) return true;
  return config.trading.mode === 'dry_run';
}

const program = new Command();

program
  .name('tidewatch')
  .description('Autonomous Solana token-trading agent')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config.yaml');

function context(): { config: TidewatchConfig; logger: Logger } {
  const opts = program.opts<{ config?: string }>();
  const config = loadConfig(opts.config);
  return { config, logger: new Logger(config.logging.level) };
}

// ============================================================================
// Cycles
// ============================================================================

program
  .command('cycle')
  .description('Run a single decision-execution cycle')
  .option('--live', 'Execute real trades')
  .option('--dry-run', 'Simulate trades')
  .action(async (options: { live?: boolean; dryRun?: boolean }) => {
    const { config, logger } = context();
    const dryRun = resolveDryRun(options, config);
    const agent = new TidewatchAgent(config, logger);
    const outcome = await agent.runCycle({ dryRun });
    printOutcome(outcome);
    await agent.stop();
    process.exitCode = outcome.status === 'completed' ? 0 : 1;
  });

program
  .command('run')
  .description('Run cycles in the background until interrupted')
  .option('-i, --interval <seconds>', 'Seconds between cycles')
  .option('--live', 'Execute real trades')
  .option('--dry-run', 'Simulate trades')
  .action(async (options: { interval?: string; live?: boolean; dryRun?: boolean }) => {
    const { config, logger } = context();
    const dryRun = resolveDryRun(options, config);
    const interval = options.interval === undefined ? undefined : Number(options.interval);
    if (interval !== undefined && (!Number.isFinite(interval) || interval < 0)) {
      throw new Error('--interval must be a non-negative number of seconds');
    }

    const agent = new TidewatchAgent(config, logger);
    const finished = new Promise<void>((resolve) => {
      agent.runner.once('stopped', () => resolve());
    });
    agent.runner.on('cycle', (outcome) => {
      logger.info(
        `Cycle ${outcome.state.cyclesCompleted} ${outcome.status}: ${outcome.actions.length} action(s)`
      );
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, stopping runner`);
      agent
        .stop()
        .then((stopped) => {
          if (!stopped) process.exitCode = 1;
        })
        .catch((error: unknown) => {
          logger.error('Shutdown failed', error);
          process.exitCode = 1;
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    if (!agent.start({ dryRun, ...(interval !== undefined ? { cycleIntervalSeconds: interval } : {}) })) {
      throw new Error('Runner is already active');
    }
    await finished;
    await agent.stop();
  });

program
  .command('status')
  .description('Show agent status from the persisted state')
  .option('--json', 'Print as JSON')
  .action((options: { json?: boolean }) => {
    const { config, logger } = context();
    const store = new StateStore(config.state.path, logger.child('state'));
    const state = store.load();
    if (options.json) {
      console.log(JSON.stringify(state, null, 2));
      return;
    }
    if (!state) {
      console.log(`No state at ${config.state.path}. Run a cycle first.`);
      return;
    }
    console.log(getStateSummary(state));
    console.log(`Healthy: ${state.healthy ? 'yes' : 'no'}`);
    console.log(`Session active: ${state.sessionActive ? `yes (${state.sessionId ?? 'unknown'})` : 'no'}`);
    console.log(`Last update: ${state.lastUpdate ?? 'never'}`);
    console.log(`Last actions: ${state.lastActions.join(', ') || 'none'}`);
    if (state.error) console.log(`Error (${state.errorType ?? 'unknown'}): ${state.error}`);
    if (state.qualityWarning) console.log(`Warning: ${state.qualityWarning}`);
  });

// ============================================================================
// State
// ============================================================================

const state = program.command('state').description('Inspect and repair the persisted state');

state
  .command('show')
  .description('Print the state document')
  .action(() => {
    const { config, logger } = context();
    const loaded = new StateStore(config.state.path, logger.child('state')).load();
    console.log(loaded ? JSON.stringify(loaded, null, 2) : 'No state.');
  });

state
  .command('validate')
  .description('Check that the state file has every required field')
  .action(() => {
    const { config, logger } = context();
    const store = new StateStore(config.state.path, logger.child('state'));
    if (!existsSync(store.path)) {
      console.log(`No state file at ${store.path}.`);
      process.exitCode = 1;
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(store.path, 'utf-8'));
    } catch (error) {
      console.log(`State file is not valid JSON: ${toErrorMessage(error)}`);
      process.exitCode = 1;
      return;
    }
    const valid = store.validate(raw);
    console.log(valid ? 'State is valid.' : 'State is missing required fields; run `state migrate`.');
    process.exitCode = valid ? 0 : 1;
  });

state
  .command('migrate')
  .description('Backfill missing fields and rewrite the state file')
  .action(() => {
    const { config, logger } = context();
    const store = new StateStore(config.state.path, logger.child('state'));
    const loaded = store.load();
    if (!loaded) {
      console.log('No readable state to migrate.');
      process.exitCode = 1;
      return;
    }
    store.save(loaded);
    console.log(`Migrated state written to ${store.path}.`);
  });

state
  .command('reset')
  .description('Replace the state with a fresh initial state')
  .option('--yes', 'Confirm the reset')
  .action((options: { yes?: boolean }) => {
    if (!options.yes) {
      console.log('This discards positions and history. Re-run with --yes to confirm.');
      process.exitCode = 1;
      return;
    }
    const { config, logger } = context();
    const store = new StateStore(config.state.path, logger.child('state'));
    store.save(
      createInitialState({
        walletBalanceSol: config.trading.initialBalanceSol,
        tradingMode: config.trading.mode,
      })
    );
    console.log(`State reset at ${store.path}.`);
  });

// ============================================================================
// Tools
// ============================================================================

program
  .command('tools')
  .description('List the action catalog')
  .addOption(new Option('--category <name>', 'Only tools in this category').choices(TOOL_CATEGORIES))
  .option('--read-only', 'Only tools without side effects')
  .action((options: { category?: string; readOnly?: boolean }) => {
    const category = TOOL_CATEGORIES.find((name) => name === options.category);
    const tools = createCatalogRegistry().list({ category, readOnly: options.readOnly });
    for (const tool of tools) {
      const flags = [tool.category, tool.sideEffects ? 'side-effects' : 'read-only'].join(', ');
      console.log(`${tool.name} [${flags}]\n  ${tool.description}`);
    }
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error(toErrorMessage(error));
  process.exitCode = 1;
});
