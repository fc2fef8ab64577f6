/**
 * Language Backend Router
 *
 * Routes each completion to the client serving the actor's model and keeps
 * usage statistics. Local models (llama3, mistral, ...) are served by an
 * OpenAI-compatible endpoint; `claude*` models go through the Anthropic SDK
 * when a key is configured.
 *
 * The router never retries: content-generating actions are not idempotent.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { LanguageBackendError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ModelRouter');

// =============================================================================
// TYPES
// =============================================================================

export interface CompletionRequest {
  model: string;
  system?: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
  /** Free-form tag for the call log, e.g. "post" */
  purpose?: string;
}

export interface UsageStats {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResult {
  text: string;
  usage: UsageStats;
  durationMs: number;
}

export interface ModelCallLog {
  timestamp: Date;
  model: string;
  inputTokens: number;
  outputTokens: number;
  durationMs: number;
  success: boolean;
  error?: string;
  purpose?: string;
}

/** Anything that can turn a prompt into text. */
export interface LanguageBackend {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResult>;
}

export interface RouterConfig {
  llmUrl: string;
  llmApiKey: string;
  anthropicApiKey: string;
  temperature: number;
  maxTokens: number;
}

// =============================================================================
// CLIENTS
// =============================================================================

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).optional(),
});

function estimateTokens(text: string): number {
  // Rough estimate: ~4 characters per token
  return Math.ceil(text.length / 4);
}

/**
 * Client for any server exposing `/chat/completions` (Ollama, vLLM, llama.cpp, OpenAI).
 */
export class OpenAICompatibleClient implements LanguageBackend {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly apiKey: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResult> {
    const startTime = Date.now();
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
      },
      body: JSON.stringify({
        model: request.model,
        messages: [
          ...(request.system ? [{ role: 'system', content: request.system }] : []),
          { role: 'user', content: request.prompt },
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new LanguageBackendError(`LLM API error (${response.status}): ${error.slice(0, 200)}`, response.status);
    }

    const body = await response.text();
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new LanguageBackendError(`Malformed completion from ${request.model}: ${errorMessage(error)}`);
    }
    const parsed = ChatCompletionSchema.safeParse(json);
    if (!parsed.success) {
      throw new LanguageBackendError(`Malformed completion from ${request.model}: ${parsed.error.message}`);
    }

    const text = parsed.data.choices[0].message.content ?? '';
    return {
      text,
      usage: {
        inputTokens: parsed.data.usage?.prompt_tokens ?? estimateTokens(request.prompt),
        outputTokens: parsed.data.usage?.completion_tokens ?? estimateTokens(text),
      },
      durationMs: Date.now() - startTime,
    };
  }
}

export class AnthropicClient implements LanguageBackend {
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResult> {
    const startTime = Date.now();
    const response = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens ?? 256,
        messages: [{ role: 'user', content: request.prompt }],
        system: request.system,
        temperature: request.temperature,
      },
      { signal }
    );

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new LanguageBackendError(`No text response from ${request.model}`);
    }

    return {
      text: textBlock.text,
      usage: { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
      durationMs: Date.now() - startTime,
    };
  }
}

// =============================================================================
// ROUTER
// =============================================================================

export interface CumulativeUsage {
  totalInputTokens: number;
  totalOutputTokens: number;
  callCount: number;
  failedCount: number;
  byModel: Record<string, UsageStats & { callCount: number }>;
}

const CALL_LOG_LIMIT = 1000;

function emptyUsage(): CumulativeUsage {
  return { totalInputTokens: 0, totalOutputTokens: 0, callCount: 0, failedCount: 0, byModel: {} };
}

export class ModelRouter implements LanguageBackend {
  private callLog: ModelCallLog[] = [];
  private cumulativeUsage: CumulativeUsage = emptyUsage();

  constructor(
    private readonly local: LanguageBackend,
    private readonly anthropic: LanguageBackend | null,
    private readonly defaults: { temperature: number; maxTokens: number }
  ) {}

  /** Which client a model name is routed to. */
  route(model: string): 'anthropic' | 'local' {
    return this.anthropic && model.toLowerCase().startsWith('claude') ? 'anthropic' : 'local';
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResult> {
    const client = this.route(request.model) === 'anthropic' && this.anthropic ? this.anthropic : this.local;
    const full: CompletionRequest = {
      ...request,
      temperature: request.temperature ?? this.defaults.temperature,
      maxTokens: request.maxTokens ?? this.defaults.maxTokens,
    };

    const startTime = Date.now();
    try {
      const result = await client.complete(full, signal);
      this.logCall({
        timestamp: new Date(),
        model: request.model,
        inputTokens: result.usage.inputTokens,
        outputTokens: result.usage.outputTokens,
        durationMs: result.durationMs,
        success: true,
        purpose: request.purpose,
      });
      this.updateCumulativeUsage(request.model, result.usage);
      log.debug(
        `${request.model}: ${result.usage.inputTokens}in/${result.usage.outputTokens}out tokens, ${result.durationMs}ms` +
          (request.purpose ? ` (${request.purpose})` : '')
      );
      return result;
    } catch (error) {
      this.cumulativeUsage.failedCount++;
      this.logCall({
        timestamp: new Date(),
        model: request.model,
        inputTokens: 0,
        outputTokens: 0,
        durationMs: Date.now() - startTime,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        purpose: request.purpose,
      });
      throw error;
    }
  }

  getCumulativeUsage(): CumulativeUsage {
    return { ...this.cumulativeUsage, byModel: { ...this.cumulativeUsage.byModel } };
  }

  getCallLog(): ModelCallLog[] {
    return [...this.callLog];
  }

  getUsageSummary(): string {
    const usage = this.cumulativeUsage;
    const lines = [
      `=== Language Backend Usage ===`,
      `Total Calls: ${usage.callCount} (${usage.failedCount} failed)`,
      `Total Tokens: ${usage.totalInputTokens.toLocaleString()} in / ${usage.totalOutputTokens.toLocaleString()} out`,
      ``,
      `By Model:`,
    ];
    for (const [model, stats] of Object.entries(usage.byModel)) {
      lines.push(
        `  ${model}: ${stats.callCount} calls, ` +
          `${stats.inputTokens.toLocaleString()}/${stats.outputTokens.toLocaleString()} tokens`
      );
    }
    return lines.join('\n');
  }

  resetUsageStats(): void {
    this.callLog = [];
    this.cumulativeUsage = emptyUsage();
  }

  private logCall(entry: ModelCallLog): void {
    this.callLog.push(entry);
    if (this.callLog.length > CALL_LOG_LIMIT) {
      this.callLog.shift();
    }
  }

  private updateCumulativeUsage(model: string, usage: UsageStats): void {
    this.cumulativeUsage.totalInputTokens += usage.inputTokens;
    this.cumulativeUsage.totalOutputTokens += usage.outputTokens;
    this.cumulativeUsage.callCount += 1;

    const stats = this.cumulativeUsage.byModel[model] ?? { inputTokens: 0, outputTokens: 0, callCount: 0 };
    stats.inputTokens += usage.inputTokens;
    stats.outputTokens += usage.outputTokens;
    stats.callCount += 1;
    this.cumulativeUsage.byModel[model] = stats;
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createModelRouter(config: RouterConfig): ModelRouter {
  const local = new OpenAICompatibleClient(config.llmUrl, config.llmApiKey);
  const anthropic = config.anthropicApiKey ? new AnthropicClient(config.anthropicApiKey) : null;
  log.info(`Local models via ${config.llmUrl}${anthropic ? '; claude* models via Anthropic' : ''}`);
  return new ModelRouter(local, anthropic, { temperature: config.temperature, maxTokens: config.maxTokens });
}
