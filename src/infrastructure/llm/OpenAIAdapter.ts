/**
 * openai SDK pointed at the model server's OpenAI-compatible API.
 *
 * The SDK's own retries are switched off; timeouts and retries live in the
 * inference gateway so that each attempt can be bounded and cancelled.
 */
import OpenAI from "openai";

import type { AppConfig } from "@config/index";
import type {
  ChatCompletionClient,
  ChatMessage,
  CompletionRequest,
  CompletionResponse,
  FinishReason,
} from "@domain/llm/ports";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";

/**
 * Outer bound for a single SDK request. It must not undercut any per-operation
 * deadline, since those are enforced by the callers' abort signals.
 */
export function sdkTimeoutMs(config: AppConfig): number {
  const { embeddingMs, generationMs } = config.resilience.timeouts;
  return Math.max(config.resilience.requestTimeout, embeddingMs, generationMs);
}

export function createOpenAIClient(config: AppConfig): OpenAI {
  return new OpenAI({
    apiKey: config.models.apiKey,
    baseURL: config.models.baseUrl,
    timeout: sdkTimeoutMs(config),
    maxRetries: 0,
  });
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

function toFinishReason(reason: string | null | undefined): FinishReason {
  if (reason === "stop" || reason === "length") {
    return reason;
  }
  return "unknown";
}

export class OpenAIChatClient implements ChatCompletionClient {
  constructor(private readonly client: OpenAI) {}

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResponse> {
    const completion = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: request.messages.map(toMessageParam),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        stop: request.stop && request.stop.length > 0 ? request.stop : undefined,
        stream: false,
      },
      { signal, maxRetries: 0 }
    );

    const choice = completion.choices[0];
    return {
      text: choice?.message.content ?? "",
      finishReason: toFinishReason(choice?.finish_reason),
    };
  }

  async *stream(request: CompletionRequest, signal: AbortSignal): AsyncIterable<string> {
    const stream = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: request.messages.map(toMessageParam),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        stop: request.stop && request.stop.length > 0 ? request.stop : undefined,
        stream: true,
      },
      { signal, maxRetries: 0 }
    );

    try {
      for await (const chunk of stream) {
        const fragment = chunk.choices[0]?.delta?.content;
        if (fragment) {
          yield fragment;
        }
      }
    } finally {
      stream.controller.abort();
    }
  }

  /** Lists models; used by the health endpoint. */
  async ping(signal?: AbortSignal): Promise<string[]> {
    const page = await this.client.models.list({ signal, maxRetries: 0 });
    return page.data.map((model) => model.id);
  }
}
