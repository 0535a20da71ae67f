import { describe, it, expect, beforeEach } from 'vitest';

import { createCatalogRegistry } from '../../src/agent/tools/adapters/index.js';
import { HashEmbedder } from '../../src/intel/embeddings.js';
import { openDatabase } from '../../src/memory/db.js';
import {
  ExperienceStore,
  describeToken,
  renderExperience,
  type ExperienceInput,
} from '../../src/memory/experiences.js';
import { quietLogger, toolContext } from '../helpers/context.js';

const winner: ExperienceInput = {
  token_address: 'WinMint111',
  token_symbol: 'WIN',
  trade_type: 'sell',
  profit_percentage: 35,
  hold_time_hours: 1,
  position_size_sol: 0.25,
  strategy: 'boosted momentum',
  reasoning: 'Volume tripled after the boost',
  lessons_learned: 'Take profit early on boosted tokens',
};

const loser: ExperienceInput = {
  token_address: 'LoseMint111',
  token_symbol: 'LOSE',
  trade_type: 'sell',
  profit_percentage: -10,
  hold_time_hours: 5,
  reasoning: 'Liquidity drained overnight',
  lessons_learned: 'Avoid thin pools',
};

const flat: ExperienceInput = {
  token_address: 'FlatMint111',
  trade_type: 'sell',
  profit_percentage: 5,
  hold_time_hours: 3,
  reasoning: 'Sideways market',
};

describe('renderExperience', () => {
  it('renders a document with defaults for missing fields', () => {
    expect(renderExperience(flat)).toBe(
      [
        'Token: UNKNOWN (FlatMint111)',
        'Trade type: sell',
        'Performance: +5.0% profit',
        'Hold time: 3.0 hours',
        'Position size: 0.0000 SOL',
        'Strategy: unknown',
        'Reasoning: Sideways market',
        'Lessons learned: ',
      ].join('\n')
    );
  });
});

describe('describeToken', () => {
  it('uses symbol and non-zero metrics', () => {
    expect(
      describeToken({ symbol: 'TIDE', market_cap: 1_234_567.8, liquidity_usd: 0, age_hours: 2.4 })
    ).toBe('Token similar to TIDE. Market cap 1234568. Age hours 2');
  });

  it('falls back to JSON when nothing is recognizable', () => {
    expect(describeToken({ foo: 'bar' })).toBe('{"foo":"bar"}');
  });
});

describe('ExperienceStore', () => {
  let store: ExperienceStore;

  beforeEach(() => {
    store = new ExperienceStore(openDatabase(':memory:'), new HashEmbedder(128), quietLogger);
  });

  it('returns nothing from an empty store', async () => {
    await expect(store.search('anything')).resolves.toEqual([]);
    expect(store.stats()).toEqual({
      total_experiences: 0,
      profitable_trades: 0,
      losing_trades: 0,
      win_rate: 0,
      embedding_provider: 'hash',
    });
  });

  it('stores experiences and reports stats', async () => {
    await store.add(winner);
    await store.add(loser);
    await store.add(flat);

    const stats = store.stats();
    expect(stats.total_experiences).toBe(3);
    expect(stats.profitable_trades).toBe(2);
    expect(stats.losing_trades).toBe(1);
    expect(stats.win_rate).toBeCloseTo(2 / 3);
  });

  it('ranks the identical document first', async () => {
    const id = await store.add(winner);
    await store.add(loser);

    const hits = await store.search(renderExperience(winner), 1);

    expect(hits).toHaveLength(1);
    expect(hits[0]?.id).toBe(id);
    expect(hits[0]?.similarity).toBeCloseTo(1, 10);
    expect(hits[0]?.was_profitable).toBe(true);
    expect(hits[0]).not.toHaveProperty('embedding');
  });

  it('filters patterns by outcome and hold time', async () => {
    await store.add(winner);
    await store.add(loser);
    await store.add(flat);

    const symbols = async (type: Parameters<ExperienceStore['patterns']>[0]) =>
      (await store.patterns(type)).map((hit) => hit.token_address).sort();

    expect(await symbols('high_profit')).toEqual(['WinMint111']);
    expect(await symbols('losing')).toEqual(['LoseMint111']);
    expect(await symbols('profitable')).toEqual(['FlatMint111', 'WinMint111']);
    expect(await symbols('quick_trades')).toEqual(['WinMint111']);
  });

  it('refuses to store an experience without an embedding', async () => {
    const broken = new ExperienceStore(
      openDatabase(':memory:'),
      { provider: 'broken', embed: async () => [[]] },
      quietLogger
    );
    await expect(broken.add(winner)).rejects.toThrow('Embedding provider returned no vector');
    expect(broken.stats().total_experiences).toBe(0);
  });
});

describe('memory tools', () => {
  it('fail explicitly when memory is disabled', async () => {
    const { ctx } = toolContext();
    const execution = await createCatalogRegistry().execute(
      'search_trading_history',
      { query: 'boosted' },
      ctx
    );
    expect(execution.result).toMatchObject({ success: false, error: 'Trading memory is disabled' });
  });

  it('save and then find an experience', async () => {
    const memory = new ExperienceStore(openDatabase(':memory:'), new HashEmbedder(), quietLogger);
    const { ctx } = toolContext({ memory });
    const registry = createCatalogRegistry();

    const saved = await registry.execute('save_trading_experience', winner, ctx);
    expect(saved.result).toMatchObject({ success: true, data: { token_address: 'WinMint111' } });

    const found = await registry.execute('find_similar_tokens', { token_data: { symbol: 'WIN' } }, ctx);
    expect(found.result).toMatchObject({ success: true, data: { count: 1 } });
  });
});
