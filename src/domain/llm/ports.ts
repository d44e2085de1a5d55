/**
 * Domain port for text generation against the local model server.
 */
export interface GenerationOptions {
  /** Caps output length. */
  maxTokens?: number;
  /** Sampling randomness. */
  temperature?: number;
  /** Generation stops early at any of these markers. */
  stopSequences?: readonly string[];
}

export type FinishReason = "stop" | "length" | "unknown";

export interface GenerationResult {
  text: string;
  model: string;
  finishReason: FinishReason;
  attempts: number;
}

export interface InferencePort {
  readonly model: string;

  generate(
    prompt: string,
    options?: GenerationOptions,
    signal?: AbortSignal
  ): Promise<GenerationResult>;

  /**
   * Lazy, finite, single-use sequence of text fragments. Abandoning the
   * iteration aborts the upstream request.
   */
  stream(
    prompt: string,
    options?: GenerationOptions,
    signal?: AbortSignal
  ): AsyncIterable<string>;
}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  stop?: string[] | undefined;
}

export interface CompletionResponse {
  text: string;
  finishReason: FinishReason;
}

/**
 * Wire-level client of the model server. The gateway adds timeouts, retries
 * and error mapping on top of it.
 */
export interface ChatCompletionClient {
  complete(
    request: CompletionRequest,
    signal: AbortSignal
  ): Promise<CompletionResponse>;

  stream(request: CompletionRequest, signal: AbortSignal): AsyncIterable<string>;
}
