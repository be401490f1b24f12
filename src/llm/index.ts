/**
 * LLM Module
 *
 * LLMService turns instructions plus page content into a value validated by
 * a zod schema. ClaudeLLMService talks to the Anthropic Messages API through
 * a narrow transport, retries rate-limit errors with backoff, and gives the
 * model one more attempt when its reply does not parse or validate.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { z } from 'zod';
import type { ModuleResult, TaskId } from '../types/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import { AbortedError, errorMessage, fail, resultMetadata, succeed, withRetry } from '../utils/index.js';

// ============================================================================
// Service Contract
// ============================================================================

/**
 * Structured request to the LLM
 */
export interface LLMRequest<T> {
  /** Task the call belongs to, stamped on the result metadata */
  taskId?: TaskId;
  /** Compiled prompt for the call site */
  instructions: string;
  /** Page content or data the instructions apply to */
  content: string;
  /** Validates the parsed reply */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Human-readable shape of the expected JSON, repeated on a corrective retry */
  schemaHint: string;
  signal?: AbortSignal;
}

export interface LLMService {
  readonly name: string;
  run<T>(request: LLMRequest<T>): Promise<ModuleResult<T>>;
}

// ============================================================================
// Transport
// ============================================================================

export interface LLMCompletionRequest {
  model: string;
  maxTokens: number;
  temperature: number;
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface LLMCompletion {
  text: string;
  inputTokens: number;
  outputTokens: number;
  stopReason: string | null;
}

/**
 * Single round trip to a model, without retries
 */
export interface LLMTransport {
  complete(request: LLMCompletionRequest): Promise<LLMCompletion>;
}

/**
 * Transport backed by the Anthropic SDK
 */
export class AnthropicTransport implements LLMTransport {
  private readonly client: Anthropic;

  constructor(apiKey: string, timeoutMs: number) {
    this.client = new Anthropic({ apiKey, timeout: timeoutMs });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletion> {
    const response = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal }
    );

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
    if (!text) {
      throw new Error('No text content in Claude response');
    }

    return {
      text,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      stopReason: response.stop_reason,
    };
  }
}

// ============================================================================
// Response Parsing
// ============================================================================

export type ParseOutcome<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Remove a surrounding markdown code fence, if present
 */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Parse a model reply as JSON and validate it against the schema
 */
export function parseStructuredResponse<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): ParseOutcome<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(text));
  } catch (error) {
    return { success: false, error: `Reply is not valid JSON: ${errorMessage(error)}` };
  }

  const validation = schema.safeParse(parsed);
  if (!validation.success) {
    const issues = validation.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    return { success: false, error: `Reply does not match the expected shape: ${issues.join('; ')}` };
  }
  return { success: true, data: validation.data };
}

// ============================================================================
// Claude Implementation
// ============================================================================

export interface ClaudeConfig {
  /** Anthropic API key (from ANTHROPIC_API_KEY env var) */
  apiKey?: string | undefined;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** SDK request timeout in milliseconds (default: 120000) */
  timeoutMs?: number;
  /** Backoff between rate-limited attempts (default: 1s, 2s, 4s, 8s) */
  rateLimitDelaysMs?: number[];
  /** Extra attempts after an unusable reply (default: 1) */
  parseRetries?: number;
}

export interface ClaudeDependencies {
  /** Transport used instead of the Anthropic SDK */
  transport?: LLMTransport;
  logger?: Logger;
  metrics?: Metrics;
}

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0;
const DEFAULT_TIMEOUT_MS = 120000;
const RATE_LIMIT_DELAYS_MS = [1000, 2000, 4000, 8000];

const SYSTEM_PROMPT =
  'You extract structured data from web pages. You MUST output ONLY valid JSON that conforms exactly to the schema given in the instructions. No markdown code fences, no explanatory text, just raw JSON.';

/**
 * Rate limits (429) and overload (529) are worth waiting out
 */
export function isRateLimitError(error: Error): boolean {
  if (error instanceof Anthropic.APIError) {
    return error.status === 429 || error.status === 529;
  }
  return (
    error.message.includes('rate_limit') ||
    error.message.includes('429') ||
    error.message.includes('overloaded')
  );
}

function composePrompt<T>(request: LLMRequest<T>): string {
  return `${request.instructions}\n\n<content>\n${request.content}\n</content>`;
}

export class ClaudeLLMService implements LLMService {
  readonly name = 'claude';

  private readonly transport: LLMTransport | null;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly rateLimitDelaysMs: number[];
  private readonly parseRetries: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(config: ClaudeConfig = {}, deps: ClaudeDependencies = {}) {
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.rateLimitDelaysMs = config.rateLimitDelaysMs ?? RATE_LIMIT_DELAYS_MS;
    this.parseRetries = config.parseRetries ?? 1;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? defaultMetrics;

    if (deps.transport) {
      this.transport = deps.transport;
    } else if (config.apiKey) {
      this.transport = new AnthropicTransport(config.apiKey, config.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    } else {
      this.transport = null;
    }
  }

  async run<T>(request: LLMRequest<T>): Promise<ModuleResult<T>> {
    const startTime = Date.now();
    const taskId = request.taskId ?? '';

    const transport = this.transport;
    if (!transport) {
      return fail(
        'MISSING_API_KEY',
        'ANTHROPIC_API_KEY is required. Set it in config or environment variable.',
        resultMetadata(taskId, 'llm', startTime)
      );
    }

    const basePrompt = composePrompt(request);
    let prompt = basePrompt;
    let lastParseError = 'No reply received';

    for (let attempt = 0; attempt <= this.parseRetries; attempt++) {
      let completion: LLMCompletion;
      try {
        completion = await this.complete(transport, prompt, request.signal);
      } catch (error) {
        this.logger.error('Claude API call failed', { taskId, error: errorMessage(error) });
        this.metrics.increment('llm.errors', { model: this.model });
        return fail('LLM_ERROR', errorMessage(error), resultMetadata(taskId, 'llm', startTime));
      }

      const parsed = parseStructuredResponse(completion.text, request.schema);
      if (parsed.success) {
        this.metrics.timing('llm.duration', Date.now() - startTime, { model: this.model });
        return succeed(parsed.data, resultMetadata(taskId, 'llm', startTime));
      }

      lastParseError = parsed.error;
      this.logger.warn('Unusable Claude reply', {
        taskId,
        attempt: attempt + 1,
        error: parsed.error,
        replyPreview: completion.text.substring(0, 200),
      });
      this.metrics.increment('llm.parse_errors', { model: this.model });
      prompt =
        `${basePrompt}\n\nYour previous reply could not be used (${parsed.error}). ` +
        `Reply again with only a JSON object of this shape:\n${request.schemaHint}`;
    }

    return fail('LLM_PARSE_ERROR', lastParseError, resultMetadata(taskId, 'llm', startTime));
  }

  private async complete(
    transport: LLMTransport,
    prompt: string,
    signal: AbortSignal | undefined
  ): Promise<LLMCompletion> {
    this.logger.debug('Calling Claude API', { model: this.model, promptLength: prompt.length });
    this.metrics.increment('llm.calls', { model: this.model });

    const completion = await withRetry(
      () => {
        if (signal?.aborted) {
          throw new AbortedError('Claude request');
        }
        const request: LLMCompletionRequest = {
          model: this.model,
          maxTokens: this.maxTokens,
          temperature: this.temperature,
          system: SYSTEM_PROMPT,
          prompt,
        };
        if (signal) {
          request.signal = signal;
        }
        return transport.complete(request);
      },
      {
        maxRetries: this.rateLimitDelaysMs.length,
        delaysMs: this.rateLimitDelaysMs,
        logger: this.logger,
        context: 'Claude request',
        shouldRetry: isRateLimitError,
        signal,
      }
    );

    this.metrics.gauge('llm.input_tokens', completion.inputTokens, { model: this.model });
    this.metrics.gauge('llm.output_tokens', completion.outputTokens, { model: this.model });
    return completion;
  }
}
