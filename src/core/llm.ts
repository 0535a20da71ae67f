import Anthropic from '@anthropic-ai/sdk';
import type {
  MessageParam,
  TextBlock,
  ToolResultBlockParam,
  ToolUseBlock,
} from '@anthropic-ai/sdk/resources/messages';

import type { TidewatchConfig } from './config.js';
import { Logger } from './logger.js';
import type { LlmToolSchema, ToolExecution } from '../agent/tools/types.js';

/**
 * One oracle turn: a context document, the actions on offer and a way to
 * invoke them.
 */
export interface OracleTurn {
  context: string;
  tools: LlmToolSchema[];
  dispatch: (name: string, input: unknown) => Promise<ToolExecution>;
  maxSteps: number;
}

export interface OracleResult {
  executions: ToolExecution[];
  rationale: string;
  steps: number;
  /** The step budget ran out before the oracle finished */
  truncated: boolean;
}

/**
 * The external decision maker. Every trading judgment is made behind this
 * interface.
 */
export interface ReasoningOracle {
  run(turn: OracleTurn): Promise<OracleResult>;
}

export const SYSTEM_PROMPT = `You are an autonomous trading agent for Solana tokens.

Each cycle you receive a snapshot of your portfolio and a set of tools. You make every decision: which tokens to research, what the data means, whether to trade, how much, and when to exit. The tools only fetch raw data and carry out what you choose; none of them judge a token for you.

Work through your objectives with the tools, then finish with a short plain-text summary of what you did and why. When you trade, state your reasoning in the trade call and record the experience afterwards so future cycles can learn from it. In dry_run mode trades are simulated; do not try to force live execution.`;

type AgentSettings = TidewatchConfig['agent'];

export class AnthropicOracle implements ReasoningOracle {
  private client: Anthropic;
  private logger: Logger;

  constructor(
    private settings: AgentSettings,
    apiKey: string | undefined = process.env.ANTHROPIC_API_KEY,
    logger?: Logger
  ) {
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY is not set');
    }
    this.client = new Anthropic({
      apiKey,
      baseURL: settings.apiBaseUrl,
      timeout: settings.timeoutMs,
      maxRetries: 2,
    });
    this.logger = logger ?? new Logger('info', 'oracle');
  }

  async run(turn: OracleTurn): Promise<OracleResult> {
    const messages: MessageParam[] = [{ role: 'user', content: turn.context }];
    const executions: ToolExecution[] = [];
    const notes: string[] = [];

    let step = 0;
    while (step < turn.maxSteps) {
      step += 1;

      const response = await this.client.messages.create({
        model: this.settings.model,
        max_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        system: SYSTEM_PROMPT,
        messages,
        tools: turn.tools,
      });

      const text = response.content
        .filter((block): block is TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('')
        .trim();
      if (text) notes.push(text);

      const toolUseBlocks = response.content.filter(
        (block): block is ToolUseBlock => block.type === 'tool_use'
      );

      if (toolUseBlocks.length === 0) {
        return { executions, rationale: text || notes.join('\n\n'), steps: step, truncated: false };
      }

      const toolResults: ToolResultBlockParam[] = [];
      for (const toolUse of toolUseBlocks) {
        this.logger.debug(`Oracle invoked ${toolUse.name}`);
        const execution = await turn.dispatch(toolUse.name, toolUse.input);
        executions.push(execution);
        const result = execution.result;
        toolResults.push({
          type: 'tool_result',
          tool_use_id: toolUse.id,
          content: JSON.stringify(result.success ? result.data : { error: result.error }),
          is_error: !result.success,
        });
      }

      messages.push({ role: 'assistant', content: response.content });
      messages.push({ role: 'user', content: toolResults });
    }

    this.logger.warn(`Oracle stopped after ${turn.maxSteps} steps without finishing`);
    return {
      executions,
      rationale: notes.join('\n\n') || `Stopped after ${turn.maxSteps} steps.`,
      steps: step,
      truncated: true,
    };
  }
}
