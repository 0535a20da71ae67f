import type { Connection } from '@solana/web3.js';

import type { TidewatchConfig } from './config.js';
import { CycleOrchestrator, type CycleOutcome, type ToolCollaborators } from './cycle.js';
import { AnthropicOracle, type ReasoningOracle } from './llm.js';
import { Logger, toErrorMessage } from './logger.js';
import { BackgroundRunner, type RunnerStatus } from './runner.js';
import { StateStore } from '../agent/state/store.js';
import type { AgentParameters } from '../agent/state/types.js';
import { createCatalogRegistry } from '../agent/tools/adapters/index.js';
import type { AgentToolRegistry } from '../agent/tools/registry.js';
import type { ExecutionAdapter } from '../execution/executor.js';
import { JupiterClient } from '../execution/jupiter.js';
import { LiveExecutor } from '../execution/modes/live.js';
import { PaperExecutor } from '../execution/modes/paper.js';
import { UnsupportedLiveExecutor } from '../execution/modes/unsupported-live.js';
import { SolanaRpc } from '../execution/solana/rpc.js';
import { TransactionSubmitter } from '../execution/solana/submitter.js';
import {
  DirectRpcTransport,
  Web3Transport,
  type TransactionTransport,
} from '../execution/solana/transports.js';
import { loadKeypairFromEnv } from '../execution/solana/wallet.js';
import { DexScreenerClient } from '../intel/dexscreener.js';
import { createEmbedder } from '../intel/embeddings.js';
import { TokenEnricher } from '../intel/enrichment.js';
import { DexScreenerPriceFeed } from '../intel/prices.js';
import { RugCheckClient } from '../intel/rugcheck.js';
import { SocialClient } from '../intel/social.js';
import { sharedCache, type EphemeralCache } from '../memory/cache.js';
import { openDatabase } from '../memory/db.js';
import { ExperienceStore } from '../memory/experiences.js';

export interface AgentOverrides {
  oracle?: ReasoningOracle;
  cache?: EphemeralCache;
  memory?: ExperienceStore | null;
  env?: NodeJS.ProcessEnv;
}

/**
 * Wires every collaborator from configuration and exposes the cycle, the
 * background runner and their status.
 */
export class TidewatchAgent {
  readonly store: StateStore;
  readonly registry: AgentToolRegistry;
  readonly orchestrator: CycleOrchestrator;
  readonly runner: BackgroundRunner;
  readonly collaborators: ToolCollaborators;
  private logger: Logger;

  constructor(
    private config: TidewatchConfig,
    logger?: Logger,
    overrides: AgentOverrides = {}
  ) {
    this.logger = logger ?? new Logger(config.logging.level);
    const env = overrides.env ?? process.env;
    const cache = overrides.cache ?? sharedCache();
    cache.startSweeper(config.cache.sweepIntervalSeconds * 1000);

    const dexscreener = new DexScreenerClient(
      config.sources.dexscreener,
      cache,
      this.logger.child('dexscreener')
    );
    const rugcheck = new RugCheckClient(config.sources.rugcheck, cache, this.logger.child('rugcheck'));
    const social = new SocialClient(
      config.sources.tweetscout,
      dexscreener,
      cache,
      env.TWEETSCOUT_API_KEY,
      this.logger.child('social')
    );
    const rpc = new SolanaRpc(config.solana);
    const jupiter = new JupiterClient(config.jupiter, cache, this.logger.child('jupiter'));

    const signer = loadKeypairFromEnv(env);
    const liveExecutor: ExecutionAdapter = signer
      ? new LiveExecutor({
          jupiter,
          signer,
          submitter: new TransactionSubmitter(
            this.transports(rpc.connection),
            this.logger.child('submitter')
          ),
          submission: {
            maxRetries: config.solana.submission.maxRetries,
            baseDelayMs: config.solana.submission.baseDelayMs,
          },
          logger: this.logger.child('live'),
        })
      : new UnsupportedLiveExecutor();

    this.collaborators = {
      logger: this.logger.child('tools'),
      cache,
      dexscreener,
      rugcheck,
      social,
      enricher: new TokenEnricher({ market: dexscreener, safety: rugcheck, social }),
      memory: overrides.memory === undefined ? this.openMemory(env) : (overrides.memory ?? undefined),
      jupiter,
      rpc,
      walletAddress: signer?.publicKey.toBase58(),
      paperExecutor: new PaperExecutor(this.logger.child('paper')),
      liveExecutor,
    };

    this.store = new StateStore(config.state.path, this.logger.child('state'));
    this.registry = createCatalogRegistry();
    this.orchestrator = new CycleOrchestrator({
      config,
      store: this.store,
      oracle:
        overrides.oracle ??
        new AnthropicOracle(config.agent, env.ANTHROPIC_API_KEY, this.logger.child('oracle')),
      registry: this.registry,
      collaborators: this.collaborators,
      priceFeed: new DexScreenerPriceFeed(dexscreener),
      logger: this.logger.child('cycle'),
    });
    this.runner = new BackgroundRunner(
      this.orchestrator,
      this.store,
      config,
      this.logger.child('runner')
    );
  }

  /**
   * Parameters that carry the configured trading mode into every cycle.
   */
  defaultParameters(overrides: AgentParameters = {}): AgentParameters {
    return { dryRun: this.config.trading.mode === 'dry_run', ...overrides };
  }

  async runCycle(params: AgentParameters = {}): Promise<CycleOutcome> {
    return this.orchestrator.runCycle(undefined, this.defaultParameters(params));
  }

  start(params: AgentParameters = {}): boolean {
    return this.runner.start(this.defaultParameters(params));
  }

  async stop(): Promise<boolean> {
    const stopped = await this.runner.stop();
    this.collaborators.cache?.stopSweeper();
    return stopped;
  }

  status(): RunnerStatus {
    return this.runner.status();
  }

  private transports(connection: Connection): TransactionTransport[] {
    const transports: TransactionTransport[] = [
      new Web3Transport(connection, this.config.solana.commitment),
    ];
    if (this.config.solana.submission.directRpcFallback) {
      transports.push(new DirectRpcTransport(this.config.solana.rpcUrl));
    }
    return transports;
  }

  private openMemory(env: NodeJS.ProcessEnv): ExperienceStore | undefined {
    if (!this.config.memory.enabled) return undefined;
    try {
      return new ExperienceStore(
        openDatabase(this.config.memory.dbPath),
        createEmbedder(this.config.memory.embeddings, env.OPENAI_API_KEY),
        this.logger.child('memory')
      );
    } catch (error) {
      this.logger.warn(`Trading memory unavailable: ${toErrorMessage(error)}`);
      return undefined;
    }
  }
}
