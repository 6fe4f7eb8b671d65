/**
 * Completion gateway
 * Wraps chat completions and embeddings behind one admission limit.
 * Provider failures never escape: they are logged and surface as null.
 */

import OpenAI from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import pLimit from "p-limit";
import type { ChatMessage } from "../model";
import type { PipelineConfig } from "../../config/pipeline";
import { createLogger, errorMessage } from "../logger";
import { UsageTracker } from "./usage";

const logger = createLogger("llm");

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";

export interface CompletionRequest {
  messages: ChatMessage[];
  systemPrompt?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  thinking?: boolean;
  stream?: boolean;
}

/**
 * What the pipeline needs from an LLM provider
 */
export interface LlmGateway {
  complete(request: CompletionRequest): Promise<string | null>;
  embed(text: string): Promise<number[] | null>;
}

export interface GatewayOptions {
  client: OpenAI;
  embeddingClient?: OpenAI;
  usage: UsageTracker;
  defaultModel: string;
  embeddingModel: string;
  temperature: number;
  thinking: boolean;
  stream: boolean;
  /** 0 = unlimited, negative = one call at a time */
  maxConcurrent: number;
  embeddingInputChars: number;
  /** Send `enable_thinking` on every request (Qwen-style providers) */
  sendThinkingFlag: boolean;
}

/**
 * Extra body field understood by OpenAI-compatible providers that expose a reasoning toggle
 */
interface ThinkingFlag {
  enable_thinking?: boolean;
}

export function concurrencyFor(maxConcurrent: number): number {
  if (maxConcurrent < 0) return 1;
  if (maxConcurrent === 0) return Infinity;
  return maxConcurrent;
}

function toProviderMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

function describeError(error: unknown): Record<string, unknown> {
  const details: Record<string, unknown> = { error: errorMessage(error) };
  if (error instanceof Error) {
    details.type = error.constructor.name;
  }
  if (typeof error === "object" && error !== null && "status" in error) {
    details.status = error.status;
  }
  return details;
}

export class OpenAIGateway implements LlmGateway {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly embeddingClient: OpenAI;

  constructor(private readonly options: GatewayOptions) {
    this.limit = pLimit(concurrencyFor(options.maxConcurrent));
    this.embeddingClient = options.embeddingClient ?? options.client;
  }

  async complete(request: CompletionRequest): Promise<string | null> {
    const model = request.model ?? this.options.defaultModel;
    const thinking = request.thinking ?? this.options.thinking;
    const stream = request.stream ?? this.options.stream;
    const temperature = request.temperature ?? this.options.temperature;

    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: request.systemPrompt ?? DEFAULT_SYSTEM_PROMPT },
      ...request.messages.map(toProviderMessage),
    ];

    return this.limit(async () => {
      try {
        if (stream || thinking) {
          return await this.completeStreaming(model, messages, request.maxTokens, temperature, thinking);
        }
        return await this.completeOnce(model, messages, request.maxTokens, temperature);
      } catch (error) {
        logger.error("Completion failed", {
          model,
          messages: messages.length,
          maxTokens: request.maxTokens,
          temperature,
          thinking,
          stream,
          ...describeError(error),
        });
        return null;
      }
    });
  }

  private async completeOnce(
    model: string,
    messages: ChatCompletionMessageParam[],
    maxTokens: number | undefined,
    temperature: number
  ): Promise<string | null> {
    const params: ChatCompletionCreateParamsNonStreaming & ThinkingFlag = {
      model,
      messages,
      max_tokens: maxTokens,
      temperature,
      stream: false,
    };
    if (this.options.sendThinkingFlag) {
      params.enable_thinking = false;
    }

    const response = await this.options.client.chat.completions.create(params);

    const content = response.choices[0]?.message?.content;
    if (!content) {
      logger.warn("Completion returned no content", { model });
      return null;
    }

    this.options.usage.record(model, {
      promptTokens: response.usage?.prompt_tokens,
      completionTokens: response.usage?.completion_tokens,
      totalTokens: response.usage?.total_tokens,
    });
    return content;
  }

  private async completeStreaming(
    model: string,
    messages: ChatCompletionMessageParam[],
    maxTokens: number | undefined,
    temperature: number,
    thinking: boolean
  ): Promise<string | null> {
    const params: ChatCompletionCreateParamsStreaming & ThinkingFlag = {
      model,
      messages,
      max_tokens: maxTokens,
      temperature,
      stream: true,
      stream_options: { include_usage: true },
    };
    if (this.options.sendThinkingFlag) {
      params.enable_thinking = thinking;
    }

    const stream = await this.options.client.chat.completions.create(params);

    let content = "";
    let reasoning = "";
    let promptTokens: number | undefined;
    let completionTokens: number | undefined;
    let totalTokens: number | undefined;

    for await (const chunk of stream) {
      if (chunk.usage) {
        promptTokens = chunk.usage.prompt_tokens;
        completionTokens = chunk.usage.completion_tokens;
        totalTokens = chunk.usage.total_tokens;
      }

      const delta = chunk.choices[0]?.delta;
      if (!delta) continue;
      if (delta.content) {
        content += delta.content;
      }
      if ("reasoning_content" in delta && typeof delta.reasoning_content === "string") {
        reasoning += delta.reasoning_content;
      }
    }

    if (reasoning) {
      logger.debug("Reasoning trace", { model, chars: reasoning.length, preview: reasoning.slice(0, 200) });
    }

    if (!content) {
      logger.warn("Streaming completion returned no content", { model });
      return null;
    }

    this.options.usage.record(model, { promptTokens, completionTokens, totalTokens });
    return content;
  }

  async embed(text: string): Promise<number[] | null> {
    if (!text || text.trim().length === 0) {
      logger.warn("Cannot generate embedding for empty text");
      return null;
    }

    const model = this.options.embeddingModel;
    try {
      const response = await this.embeddingClient.embeddings.create({
        model,
        input: text.substring(0, this.options.embeddingInputChars),
      });

      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        logger.warn("Embedding response was empty", { model });
        return null;
      }

      this.options.usage.record(model, {
        promptTokens: response.usage?.prompt_tokens,
        totalTokens: response.usage?.total_tokens,
      });
      return embedding;
    } catch (error) {
      logger.error("Embedding failed", { model, chars: text.length, ...describeError(error) });
      return null;
    }
  }
}

/**
 * Build the gateway for a config, creating the provider clients
 */
export function createGateway(config: PipelineConfig, usage: UsageTracker): OpenAIGateway {
  const client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
  const embeddingClient =
    config.embeddingBaseUrl === config.baseUrl && config.embeddingApiKey === config.apiKey
      ? client
      : new OpenAI({ apiKey: config.embeddingApiKey, baseURL: config.embeddingBaseUrl });

  return new OpenAIGateway({
    client,
    embeddingClient,
    usage,
    defaultModel: config.models.default,
    embeddingModel: config.models.embedding,
    temperature: config.temperature,
    thinking: config.thinking,
    stream: config.stream,
    maxConcurrent: config.maxConcurrent,
    embeddingInputChars: config.embeddingInputChars,
    sendThinkingFlag: config.provider !== "openai",
  });
}
