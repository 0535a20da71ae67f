import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { isLogLevel } from './logger.js';

export const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

export const DEFAULT_CONFIG_PATH = join(homedir(), '.tidewatch', 'config.yaml');

const ConfigSchema = z.object({
  agent: z
    .object({
      model: z.string().default('claude-sonnet-4-20250514'),
      apiBaseUrl: z.string().optional(),
      maxSteps: z.number().int().positive().default(20),
      maxTokens: z.number().int().positive().default(4096),
      temperature: z.number().min(0).max(1).default(0.1),
      timeoutMs: z.number().int().positive().default(120_000),
      objectives: z
        .array(z.string())
        .default([
          'Check wallet balance and system status',
          'Review open positions for exits',
          'Discover and research new token opportunities',
          'Consult trading memory before deciding',
          'Execute trades with explicit reasoning and record the experience',
        ]),
    })
    .default({}),
  trading: z
    .object({
      mode: z.enum(['dry_run', 'live']).default('dry_run'),
      initialBalanceSol: z.number().nonnegative().default(1),
      defaultSlippageBps: z.number().int().positive().default(100),
      stopLossPct: z.number().positive().default(15),
      takeProfitPct: z.number().positive().default(50),
    })
    .default({}),
  runner: z
    .object({
      cycleIntervalSeconds: z.number().nonnegative().default(300),
      errorBackoffSeconds: z.number().nonnegative().default(600),
      idleBackoffSeconds: z.number().nonnegative().default(450),
      maxConsecutiveErrors: z.number().int().positive().default(3),
      stopTimeoutMs: z.number().int().positive().default(15_000),
      sleepSliceMs: z.number().int().positive().default(1000),
    })
    .default({}),
  state: z
    .object({
      path: z.string().default('~/.tidewatch/agent_state.json'),
      errorHistoryLimit: z.number().int().positive().default(50),
      tradeHistoryLimit: z.number().int().positive().default(200),
    })
    .default({}),
  cache: z
    .object({
      sweepIntervalSeconds: z.number().positive().default(60),
    })
    .default({}),
  solana: z
    .object({
      rpcUrl: z.string().default('https://solana-rpc.publicnode.com'),
      commitment: z.enum(['processed', 'confirmed', 'finalized']).default('confirmed'),
      submission: z
        .object({
          maxRetries: z.number().int().positive().default(3),
          baseDelayMs: z.number().int().nonnegative().default(2000),
          directRpcFallback: z.boolean().default(true),
        })
        .default({}),
    })
    .default({}),
  jupiter: z
    .object({
      quoteUrl: z.string().default('https://quote-api.jup.ag/v6/quote'),
      swapUrl: z.string().default('https://quote-api.jup.ag/v6/swap'),
      priorityFeeMicroLamports: z.number().int().nonnegative().default(50_000),
      timeoutMs: z.number().int().positive().default(15_000),
    })
    .default({}),
  sources: z
    .object({
      dexscreener: z
        .object({
          baseUrl: z.string().default('https://api.dexscreener.com'),
          chainId: z.string().default('solana'),
          timeoutMs: z.number().int().positive().default(15_000),
          maxRetries: z.number().int().nonnegative().default(3),
        })
        .default({}),
      rugcheck: z
        .object({
          baseUrl: z.string().default('https://api.rugcheck.xyz/v1'),
          timeoutMs: z.number().int().positive().default(15_000),
        })
        .default({}),
      tweetscout: z
        .object({
          baseUrl: z.string().default('https://api.tweetscout.io/v2'),
          timeoutMs: z.number().int().positive().default(15_000),
        })
        .default({}),
    })
    .default({}),
  memory: z
    .object({
      enabled: z.boolean().default(true),
      dbPath: z.string().default('~/.tidewatch/memory.sqlite'),
      embeddings: z
        .object({
          provider: z.enum(['openai', 'hash']).default('openai'),
          model: z.string().default('text-embedding-3-small'),
          apiBaseUrl: z.string().default('https://api.openai.com'),
          dimensions: z.number().int().positive().default(256),
        })
        .default({}),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type TidewatchConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): TidewatchConfig {
  return ConfigSchema.parse(raw ?? {});
}

export function loadConfig(configPath?: string): TidewatchConfig {
  const explicit = configPath ?? process.env.TIDEWATCH_CONFIG_PATH;
  const path = explicit ? expandHome(explicit) : DEFAULT_CONFIG_PATH;

  let parsed: unknown = {};
  if (explicit || existsSync(path)) {
    const raw = readFileSync(path, 'utf-8');
    parsed = yaml.parse(raw) ?? {};
  }

  const cfg = parseConfig(parsed);

  const envMode = process.env.TIDEWATCH_TRADING_MODE;
  if (envMode === 'dry_run' || envMode === 'live') {
    cfg.trading.mode = envMode;
  }
  if (process.env.TIDEWATCH_STATE_PATH) {
    cfg.state.path = process.env.TIDEWATCH_STATE_PATH;
  }
  if (process.env.SOLANA_RPC_URL) {
    cfg.solana.rpcUrl = process.env.SOLANA_RPC_URL;
  }
  const envLevel = process.env.TIDEWATCH_LOG_LEVEL;
  if (envLevel && isLogLevel(envLevel)) {
    cfg.logging.level = envLevel;
  }

  cfg.state.path = expandHome(cfg.state.path);
  cfg.memory.dbPath = expandHome(cfg.memory.dbPath);

  return cfg;
}
