/**
 * Trading experience memory
 *
 * Past trades and their outcomes, stored with an embedding of a text
 * rendering so the oracle can ask "what happened last time something
 * looked like this". Ranking is plain cosine similarity over every stored
 * row that passes the SQL filter.
 */

import { randomUUID } from 'node:crypto';

import type Database from 'better-sqlite3';
import { z } from 'zod';

import { Logger } from '../core/logger.js';
import { cosineSimilarity, type Embedder } from '../intel/embeddings.js';

export const PATTERN_TYPES = ['profitable', 'losing', 'high_profit', 'quick_trades'] as const;
export type PatternType = (typeof PATTERN_TYPES)[number];

/** Profit at or above this percentage counts as a high-profit trade. */
export const HIGH_PROFIT_PCT = 20;
/** Holds at or under this many hours count as quick trades. */
export const QUICK_TRADE_HOURS = 2;

export interface ExperienceInput {
  token_address: string;
  token_symbol?: string;
  trade_type: string;
  profit_percentage?: number;
  hold_time_hours?: number;
  position_size_sol?: number;
  strategy?: string;
  reasoning: string;
  lessons_learned?: string;
}

const ExperienceRowSchema = z.object({
  id: z.string(),
  token_address: z.string(),
  token_symbol: z.string(),
  trade_type: z.string(),
  profit_percentage: z.number(),
  was_profitable: z.number().transform((v) => v === 1),
  hold_time_hours: z.number(),
  position_size_sol: z.number(),
  strategy: z.string(),
  reasoning: z.string(),
  lessons_learned: z.string(),
  embedding: z.string(),
  created_at: z.string(),
});

type ExperienceRow = z.infer<typeof ExperienceRowSchema>;
export type ExperienceRecord = Omit<ExperienceRow, 'embedding'>;

export interface ExperienceHit extends ExperienceRecord {
  similarity: number;
}

export interface ExperienceFilter {
  wasProfitable?: boolean;
  minProfitPct?: number;
  maxHoldHours?: number;
}

export interface ExperienceStats {
  total_experiences: number;
  profitable_trades: number;
  losing_trades: number;
  win_rate: number;
  embedding_provider: string;
}

export function renderExperience(input: ExperienceInput): string {
  const profit = input.profit_percentage ?? 0;
  return [
    `Token: ${input.token_symbol ?? 'UNKNOWN'} (${input.token_address})`,
    `Trade type: ${input.trade_type}`,
    `Performance: ${profit >= 0 ? '+' : ''}${profit.toFixed(1)}% profit`,
    `Hold time: ${(input.hold_time_hours ?? 0).toFixed(1)} hours`,
    `Position size: ${(input.position_size_sol ?? 0).toFixed(4)} SOL`,
    `Strategy: ${input.strategy ?? 'unknown'}`,
    `Reasoning: ${input.reasoning}`,
    `Lessons learned: ${input.lessons_learned ?? ''}`,
  ].join('\n');
}

/**
 * Describe a token's raw characteristics as a similarity query.
 */
export function describeToken(token: Record<string, unknown>): string {
  const parts: string[] = [];
  const symbol = token.symbol ?? token.token_symbol;
  if (typeof symbol === 'string' && symbol) {
    parts.push(`Token similar to ${symbol}`);
  }
  for (const [field, label] of [
    ['market_cap', 'Market cap'],
    ['liquidity_usd', 'Liquidity'],
    ['volume_24h', 'Volume 24h'],
    ['price_change_24h', 'Price change 24h'],
    ['age_hours', 'Age hours'],
  ] as const) {
    const value = token[field];
    if (typeof value === 'number' && value !== 0) {
      parts.push(`${label} ${Math.round(value)}`);
    }
  }
  return parts.length > 0 ? parts.join('. ') : JSON.stringify(token);
}

function patternFilter(type: PatternType): ExperienceFilter {
  switch (type) {
    case 'profitable':
      return { wasProfitable: true };
    case 'losing':
      return { wasProfitable: false };
    case 'high_profit':
      return { minProfitPct: HIGH_PROFIT_PCT };
    case 'quick_trades':
      return { maxHoldHours: QUICK_TRADE_HOURS };
  }
}

function parseVector(raw: string): number[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((v): v is number => typeof v === 'number') : [];
  } catch {
    return [];
  }
}

function toRecord(row: ExperienceRow): ExperienceRecord {
  const { embedding: _embedding, ...record } = row;
  return record;
}

export class ExperienceStore {
  private logger: Logger;

  constructor(
    private db: Database.Database,
    private embedder: Embedder,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('info', 'memory');
  }

  get provider(): string {
    return this.embedder.provider;
  }

  async add(input: ExperienceInput): Promise<string> {
    const text = renderExperience(input);
    const [vector] = await this.embedder.embed([text]);
    if (!vector || vector.length === 0) {
      throw new Error('Embedding provider returned no vector');
    }

    const id = randomUUID();
    const profit = input.profit_percentage ?? 0;
    this.db
      .prepare(
        `
          INSERT INTO trading_experiences (
            id, token_address, token_symbol, trade_type, profit_percentage, was_profitable,
            hold_time_hours, position_size_sol, strategy, reasoning, lessons_learned,
            document_text, embedding, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `
      )
      .run(
        id,
        input.token_address,
        input.token_symbol ?? 'UNKNOWN',
        input.trade_type,
        profit,
        profit > 0 ? 1 : 0,
        input.hold_time_hours ?? 0,
        input.position_size_sol ?? 0,
        input.strategy ?? 'unknown',
        input.reasoning,
        input.lessons_learned ?? '',
        text,
        JSON.stringify(vector),
        new Date().toISOString()
      );

    this.logger.info(`Stored ${input.trade_type} experience for ${input.token_symbol ?? input.token_address}`);
    return id;
  }

  async search(query: string, limit = 5, filter: ExperienceFilter = {}): Promise<ExperienceHit[]> {
    const rows = this.rows(filter);
    if (rows.length === 0) return [];

    const [target] = await this.embedder.embed([query]);
    if (!target || target.length === 0) return [];

    return rows
      .map((row) => ({
        ...toRecord(row),
        similarity: cosineSimilarity(target, parseVector(row.embedding)),
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, Math.max(1, limit));
  }

  async findSimilar(token: Record<string, unknown>, limit = 5): Promise<ExperienceHit[]> {
    return this.search(describeToken(token), limit);
  }

  async patterns(type: PatternType, limit = 10): Promise<ExperienceHit[]> {
    return this.search(`Trading patterns for ${type} trades`, limit, patternFilter(type));
  }

  stats(): ExperienceStats {
    const row = z
      .object({ total: z.number(), profitable: z.number().nullable() })
      .parse(
        this.db
          .prepare(
            `SELECT COUNT(*) AS total, SUM(was_profitable) AS profitable FROM trading_experiences`
          )
          .get()
      );
    const profitable = row.profitable ?? 0;
    return {
      total_experiences: row.total,
      profitable_trades: profitable,
      losing_trades: row.total - profitable,
      win_rate: row.total > 0 ? profitable / row.total : 0,
      embedding_provider: this.embedder.provider,
    };
  }

  private rows(filter: ExperienceFilter): ExperienceRow[] {
    const clauses: string[] = [];
    const params: number[] = [];
    if (filter.wasProfitable !== undefined) {
      clauses.push('was_profitable = ?');
      params.push(filter.wasProfitable ? 1 : 0);
    }
    if (filter.minProfitPct !== undefined) {
      clauses.push('profit_percentage >= ?');
      params.push(filter.minProfitPct);
    }
    if (filter.maxHoldHours !== undefined) {
      clauses.push('hold_time_hours <= ?');
      params.push(filter.maxHoldHours);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const raw = this.db
      .prepare(`SELECT * FROM trading_experiences ${where} ORDER BY created_at DESC`)
      .all(...params);
    return z.array(ExperienceRowSchema).parse(raw);
  }
}
