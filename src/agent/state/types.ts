/**
 * Agent State
 *
 * The persisted world-state document. Every field carries a default so an
 * older or partial document can be brought forward; keys this version does
 * not know about pass through untouched.
 */

import { z } from 'zod';

export const TRADING_MODES = ['dry_run', 'live'] as const;

/** Stand-in timestamp for records persisted before the field existed */
export const UNKNOWN_TIMESTAMP = new Date(0).toISOString();

export const PositionSchema = z
  .object({
    tokenAddress: z.string().min(1),
    tokenSymbol: z.string().default('UNKNOWN').catch('UNKNOWN'),
    entryPriceUsd: z.number().nonnegative().default(0).catch(0),
    currentPriceUsd: z.number().nonnegative().default(0).catch(0),
    /** SOL committed at entry */
    sizeSol: z.number().nonnegative().default(0).catch(0),
    unrealizedPnlSol: z.number().default(0).catch(0),
    openedAt: z.string().default(UNKNOWN_TIMESTAMP).catch(UNKNOWN_TIMESTAMP),
    stopLossPct: z.number().positive().default(15).catch(15),
    takeProfitPct: z.number().positive().default(50).catch(50),
    reasoning: z.string().default('').catch(''),
    /** Opened by a dry-run execution; never backed by funds */
    simulated: z.boolean().default(false).catch(false),
  })
  .passthrough();

export type Position = z.infer<typeof PositionSchema>;

export const PortfolioMetricsSchema = z.object({
  totalValueSol: z.number().default(0),
  positionsValueSol: z.number().default(0),
  simulatedValueSol: z.number().default(0),
  unrealizedPnlSol: z.number().default(0),
  realizedPnlSol: z.number().default(0),
  cashAllocationPct: z.number().default(100),
  openPositions: z.number().int().nonnegative().default(0),
  simulatedPositions: z.number().int().nonnegative().default(0),
  tradesExecuted: z.number().int().nonnegative().default(0),
});

export type PortfolioMetrics = z.infer<typeof PortfolioMetricsSchema>;

export const AgentParametersSchema = z
  .object({
    objectives: z.array(z.string()).optional(),
    cycleIntervalSeconds: z.number().nonnegative().optional(),
    maxSteps: z.number().int().positive().optional(),
    dryRun: z.boolean().optional(),
  })
  .passthrough();

export type AgentParameters = z.infer<typeof AgentParametersSchema>;

export const ErrorRecordSchema = z
  .object({
    message: z.string().default('Unknown error').catch('Unknown error'),
    type: z.string().nullable().default(null).catch(null),
    timestamp: z.string().nullable().default(null).catch(null),
    cycle: z.number().int().nonnegative().default(0).catch(0),
  })
  .passthrough();

export type ErrorRecord = z.infer<typeof ErrorRecordSchema>;

export const TradeRecordSchema = z
  .object({
    id: z.string().default('').catch(''),
    side: z.enum(['buy', 'sell']),
    tokenAddress: z.string().min(1),
    tokenSymbol: z.string().default('UNKNOWN').catch('UNKNOWN'),
    amountSol: z.number().nonnegative().default(0).catch(0),
    priceUsd: z.number().nonnegative().default(0).catch(0),
    simulated: z.boolean().default(false).catch(false),
    signature: z.string().nullable().default(null).catch(null),
    realizedPnlSol: z.number().nullable().default(null).catch(null),
    reasoning: z.string().default('').catch(''),
    timestamp: z.string().default(UNKNOWN_TIMESTAMP).catch(UNKNOWN_TIMESTAMP),
  })
  .passthrough();

export type TradeRecord = z.infer<typeof TradeRecordSchema>;

/**
 * Keep the entries of a list that parse. Item schemas default every field
 * but their identity, so only an entry without one is dropped.
 */
function listOf<O, I>(item: z.ZodType<O, z.ZodTypeDef, I>) {
  return z
    .array(z.unknown())
    .default([])
    .catch([])
    .transform((items) =>
      items.flatMap((entry) => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      })
    );
}

export const AgentStateSchema = z
  .object({
    walletBalanceSol: z.number().nonnegative().default(0).catch(0),
    positions: listOf(PositionSchema),
    metrics: PortfolioMetricsSchema.default({}).catch(() => PortfolioMetricsSchema.parse({})),
    parameters: AgentParametersSchema.default({}).catch({}),
    tradingMode: z.enum(TRADING_MODES).default('dry_run').catch('dry_run'),
    cyclesCompleted: z.number().int().nonnegative().default(0).catch(0),
    lastActions: z.array(z.string()).default([]).catch([]),
    lastRationale: z.string().nullable().default(null).catch(null),
    lastUpdate: z.string().nullable().default(null).catch(null),
    error: z.string().nullable().default(null).catch(null),
    errorTimestamp: z.string().nullable().default(null).catch(null),
    errorType: z.string().nullable().default(null).catch(null),
    errorHistory: listOf(ErrorRecordSchema),
    tradeHistory: listOf(TradeRecordSchema),
    qualityWarning: z.string().nullable().default(null).catch(null),
    healthy: z.boolean().default(true).catch(true),
    sessionActive: z.boolean().default(false).catch(false),
    sessionId: z.string().nullable().default(null).catch(null),
    sessionEndedAt: z.string().nullable().default(null).catch(null),
    shouldStop: z.boolean().default(false).catch(false),
    fatalError: z.string().nullable().default(null).catch(null),
  })
  .passthrough();

export type AgentState = z.infer<typeof AgentStateSchema>;
export type TradingMode = AgentState['tradingMode'];

/**
 * Top-level fields a persisted document must carry to load without migration.
 */
export const REQUIRED_STATE_FIELDS = [
  'walletBalanceSol',
  'positions',
  'tradingMode',
  'cyclesCompleted',
  'parameters',
] as const;
