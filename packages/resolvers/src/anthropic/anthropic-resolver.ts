/**
 * Anthropic semantic resolver
 *
 * Every operation forces one tool call and validates its input with
 * zod. Retries, timeouts and concurrency belong to the guarded wrapper
 * around this resolver, so the SDK's own retries are switched off.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { z } from 'zod';
import { ResolverError, formatZodIssues } from '@snowmatch/core';
import type {
  BaseModelMatch,
  ModifierContext,
  ModifierResolution,
  SemanticResolver,
  WorkingProductRecord,
} from '@snowmatch/core';
import { toResolverError } from './errors.js';
import {
  CHECK_CONSISTENCY_TOOL,
  MATCH_BASE_MODEL_TOOL,
  RESOLVE_MODIFIER_TOOL,
  checkConsistencyInputSchema,
  matchBaseModelInputSchema,
  resolveModifierInputSchema,
} from './tools.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';

export interface AnthropicResolverConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  /** SDK request timeout; the guarded wrapper usually fires first */
  requestTimeoutMs?: number;
  baseURL?: string;
}

const SYSTEM_PROMPT = [
  'You reconcile Nordic snowmobile dealer price lists against manufacturer catalogs.',
  'Answer only through the tool you are given.',
  'Prefer null or a low confidence over guessing.',
].join(' ');

export class AnthropicSemanticResolver implements SemanticResolver {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(config: AnthropicResolverConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.requestTimeoutMs ?? 60_000,
      maxRetries: 0,
    });
    this.model = config.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.maxTokens = config.maxTokens ?? 1024;
  }

  async matchBaseModel(brand: string, targetName: string, candidates: string[]): Promise<BaseModelMatch> {
    if (candidates.length === 0) {
      return { name: null, confidence: 0, reasoning: 'no candidates' };
    }

    const prompt = [
      `Brand: ${brand}`,
      `Price-list model name: ${targetName}`,
      'Catalog model families:',
      ...candidates.map((candidate) => `- ${candidate}`),
      '',
      'Which catalog model family is the price-list model? Report it with match_base_model.',
    ].join('\n');

    const input = await this.callTool(MATCH_BASE_MODEL_TOOL, prompt, matchBaseModelInputSchema);

    if (input.name !== null && !candidates.includes(input.name)) {
      throw new ResolverError({
        code: 'INVALID_RESPONSE',
        message: `match_base_model returned '${input.name}', which is not a candidate`,
        collaborator: 'anthropic',
        context: { candidates },
      });
    }

    return { name: input.name, confidence: input.confidence, reasoning: input.reasoning };
  }

  async resolveModifier(brand: string, token: string, context: ModifierContext): Promise<ModifierResolution> {
    const prompt = [
      `Brand: ${brand}`,
      `Model: ${context.modelFamily} ${context.modelYear} (code ${context.modelCode}, category ${context.category ?? 'unknown'})`,
      `Spring option: ${token}`,
      'Current specification (JSON):',
      JSON.stringify(context.spec, null, 2),
      '',
      'Describe how this option changes the specification with resolve_modifier.',
      'Use paths that exist in the specification where the option changes them.',
    ].join('\n');

    const input = await this.callTool(RESOLVE_MODIFIER_TOOL, prompt, resolveModifierInputSchema);
    return {
      deltas: input.deltas,
      confidence: input.confidence,
      category: input.category,
      reasoning: input.reasoning,
    };
  }

  async checkConsistency(record: WorkingProductRecord, originalText: string): Promise<number> {
    const prompt = [
      `Price-list line: ${originalText}`,
      'Assembled product record (JSON):',
      JSON.stringify({ identity: record.identity, spec: record.spec }, null, 2),
      '',
      'Does the record describe the same snowmobile as the line? Report with check_consistency.',
    ].join('\n');

    const input = await this.callTool(CHECK_CONSISTENCY_TOOL, prompt, checkConsistencyInputSchema);
    return input.confidence;
  }

  private async callTool<T>(
    tool: Anthropic.Tool,
    prompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: 0,
        system: SYSTEM_PROMPT,
        tools: [tool],
        tool_choice: { type: 'tool', name: tool.name },
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      throw toResolverError(error, tool.name);
    }

    for (const block of response.content) {
      if (block.type !== 'tool_use' || block.name !== tool.name) continue;

      const parsed = schema.safeParse(block.input);
      if (!parsed.success) {
        throw new ResolverError({
          code: 'INVALID_RESPONSE',
          message: formatZodIssues(`Invalid ${tool.name} input`, parsed.error),
          collaborator: 'anthropic',
          context: { operation: tool.name },
        });
      }
      return parsed.data;
    }

    throw new ResolverError({
      code: 'INVALID_RESPONSE',
      message: `Model did not call ${tool.name} (stop reason: ${response.stop_reason ?? 'unknown'})`,
      collaborator: 'anthropic',
      context: { operation: tool.name },
    });
  }
}

export function createAnthropicResolver(config: AnthropicResolverConfig): AnthropicSemanticResolver {
  return new AnthropicSemanticResolver(config);
}
