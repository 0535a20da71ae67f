/**
 * Tool Registry
 *
 * Central registry for all agent tools, with a result cache for read-only ones.
 */

import { createHash } from 'node:crypto';

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { toErrorMessage } from '../../core/logger.js';
import {
  fail,
  type ToolDefinition,
  type ToolResult,
  type ToolContext,
  type ToolExecution,
  type ToolCacheEntry,
  type ListToolsOptions,
  type LlmToolSchema,
} from './types.js';

const JsonObjectSchema = z
  .object({
    properties: z.record(z.unknown()).default({}),
    required: z.array(z.string()).default([]),
  })
  .passthrough();

export class AgentToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();
  private cache: Map<string, ToolCacheEntry> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  registerAll(tools: ToolDefinition[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  list(options?: ListToolsOptions): ToolDefinition[] {
    let tools = Array.from(this.tools.values());

    if (options?.category) {
      tools = tools.filter((t) => t.category === options.category);
    }

    if (options?.readOnly) {
      tools = tools.filter((t) => !t.sideEffects);
    }

    return tools;
  }

  /**
   * Execute a tool, serving read-only results from the cache. Always
   * resolves; every failure is folded into the result envelope.
   */
  async execute(name: string, input: unknown, ctx: ToolContext): Promise<ToolExecution> {
    const tool = this.tools.get(name);
    if (!tool) {
      return {
        toolName: name,
        input,
        result: fail(`Unknown tool: ${name}`),
        timestamp: new Date().toISOString(),
        durationMs: 0,
        cached: false,
      };
    }

    // Check cache for read-only tools
    const cacheKey = this.getCacheKey(name, input);
    if (!tool.sideEffects && tool.cacheTtlMs > 0) {
      const cached = this.getFromCache(cacheKey, tool.cacheTtlMs);
      if (cached) {
        return {
          toolName: name,
          input,
          result: cached,
          timestamp: new Date().toISOString(),
          durationMs: 0,
          cached: true,
        };
      }
    }

    const parseResult = tool.schema.safeParse(input ?? {});
    if (!parseResult.success) {
      const issues = parseResult.error.issues
        .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
        .join('; ');
      return {
        toolName: name,
        input,
        result: fail(`Invalid input: ${issues}`),
        timestamp: new Date().toISOString(),
        durationMs: 0,
        cached: false,
      };
    }

    const startTime = Date.now();
    let result: ToolResult;

    try {
      result = await tool.execute(parseResult.data, ctx);
    } catch (error) {
      ctx.logger?.warn(`Tool ${name} threw: ${toErrorMessage(error)}`);
      result = fail(toErrorMessage(error));
    }

    const durationMs = Date.now() - startTime;

    if (result.success && !tool.sideEffects && tool.cacheTtlMs > 0) {
      this.setCache(cacheKey, result);
    }

    return {
      toolName: name,
      input,
      result,
      timestamp: new Date().toISOString(),
      durationMs,
      cached: false,
    };
  }

  /**
   * Tool schemas for LLM tool calling, generated from each zod schema.
   */
  getLlmSchemas(options?: ListToolsOptions): LlmToolSchema[] {
    return this.list(options).map((tool) => {
      const json = JsonObjectSchema.parse(
        zodToJsonSchema(tool.schema, { $refStrategy: 'none', target: 'jsonSchema7' })
      );
      return {
        name: tool.name,
        description: tool.description,
        input_schema: {
          type: 'object',
          properties: json.properties,
          required: json.required,
        },
      };
    });
  }

  private getCacheKey(name: string, input: unknown): string {
    const inputHash = createHash('sha256')
      .update(JSON.stringify(input ?? {}))
      .digest('hex')
      .slice(0, 16);
    return `${name}:${inputHash}`;
  }

  private getFromCache(key: string, ttlMs: number): ToolResult | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    const age = Date.now() - entry.cachedAt;
    if (age > ttlMs) {
      this.cache.delete(key);
      return null;
    }

    return entry.result;
  }

  private setCache(key: string, result: ToolResult): void {
    this.cache.set(key, {
      result,
      cachedAt: Date.now(),
      key,
    });
  }
}
