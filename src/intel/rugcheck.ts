import { z } from 'zod';

import type { TidewatchConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { CACHE_TTL, type EphemeralCache } from '../memory/cache.js';
import { fetchJson } from './http.js';
import type { SourceHealth } from './source.js';

const HolderSchema = z
  .object({
    address: z.string().nullish(),
    pct: z.number().nullish(),
    amount: z.number().nullish(),
    insider: z.boolean().nullish(),
  })
  .passthrough();

const LockerSchema = z
  .object({
    usdcLocked: z.number().nullish(),
    unlockDate: z.number().nullish(),
    type: z.string().nullish(),
  })
  .passthrough();

const ReportSchema = z
  .object({
    score: z.number().nullish(),
    score_normalised: z.number().nullish(),
    risks: z.array(z.unknown()).nullish(),
    rugged: z.boolean().nullish(),
    mintAuthority: z.string().nullish(),
    freezeAuthority: z.string().nullish(),
    tokenProgram: z.string().nullish(),
    topHolders: z.array(HolderSchema).nullish(),
    totalHolders: z.number().nullish(),
    totalMarketLiquidity: z.number().nullish(),
    totalLPProviders: z.number().nullish(),
    lockers: z.record(LockerSchema).nullish(),
    tokenMeta: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type RugCheckReport = z.infer<typeof ReportSchema>;

export interface HolderMetrics {
  holderCount: number;
  top1Pct: number;
  top5Pct: number;
  top10Pct: number;
  insiderCount: number;
}

export interface SafetyData {
  token_address: string;
  score_raw: number;
  score_normalised: number;
  rugged: boolean;
  risks_raw: unknown[];
  mint_authority_present: boolean;
  freeze_authority_present: boolean;
  token_program: string;
  total_holders: number;
  total_market_liquidity: number;
  total_lp_providers: number;
  total_locked_usd: number;
  holder_metrics: HolderMetrics;
  token_metadata_raw: Record<string, unknown>;
  collected_at: string;
}

export function summarizeHolders(holders: RugCheckReport['topHolders']): HolderMetrics {
  const list = holders ?? [];
  const pct = (slice: typeof list) => slice.reduce((sum, h) => sum + (h.pct ?? 0), 0);
  return {
    holderCount: list.length,
    top1Pct: list[0]?.pct ?? 0,
    top5Pct: pct(list.slice(0, 5)),
    top10Pct: pct(list.slice(0, 10)),
    insiderCount: list.filter((h) => h.insider === true).length,
  };
}

export function toSafetyData(tokenAddress: string, report: RugCheckReport): SafetyData {
  const lockers = Object.values(report.lockers ?? {});
  return {
    token_address: tokenAddress,
    score_raw: report.score ?? 0,
    score_normalised: report.score_normalised ?? 0,
    rugged: report.rugged ?? false,
    risks_raw: report.risks ?? [],
    mint_authority_present: Boolean(report.mintAuthority),
    freeze_authority_present: Boolean(report.freezeAuthority),
    token_program: report.tokenProgram ?? '',
    total_holders: report.totalHolders ?? 0,
    total_market_liquidity: report.totalMarketLiquidity ?? 0,
    total_lp_providers: report.totalLPProviders ?? 0,
    total_locked_usd: lockers.reduce((sum, l) => sum + (l.usdcLocked ?? 0), 0),
    holder_metrics: summarizeHolders(report.topHolders),
    token_metadata_raw: report.tokenMeta ?? {},
    collected_at: new Date().toISOString(),
  };
}

type RugCheckSettings = TidewatchConfig['sources']['rugcheck'];

export class RugCheckClient {
  private logger: Logger;

  constructor(
    private settings: RugCheckSettings,
    private cache: EphemeralCache,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('info', 'rugcheck');
  }

  async getSafetyData(tokenAddress: string): Promise<SafetyData> {
    const raw = await this.cache.remember(`rugcheck:${tokenAddress}`, CACHE_TTL.safety, () =>
      fetchJson(`${this.settings.baseUrl}/tokens/${tokenAddress}/report`, {
        timeoutMs: this.settings.timeoutMs,
        maxRetries: 2,
      })
    );
    const parsed = ReportSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Unexpected RugCheck report shape for ${tokenAddress}`);
      throw new Error('RugCheck returned an unrecognized report');
    }
    return toSafetyData(tokenAddress, parsed.data);
  }

  async health(): Promise<SourceHealth> {
    try {
      await fetchJson(`${this.settings.baseUrl}/stats/new_tokens`, {
        timeoutMs: this.settings.timeoutMs,
      });
      return { ok: true };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}
