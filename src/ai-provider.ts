import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from "openai";
import { PermanentProviderError, TransientProviderError, describeError } from "@/lib/errors";

export interface AiRequest {
  content: string;
  model: string;
  max_tokens: number;
  temperature: number;
  system_prompt: string;
  api_key: string;
}

export interface AiResponse {
  text: string;
}

/**
 * Text-generation backend. Implementations throw TransientProviderError for
 * failures worth retrying and PermanentProviderError for everything else.
 */
export interface AiProvider {
  complete(request: AiRequest, signal?: AbortSignal): Promise<AiResponse>;
}

export interface OpenAiProviderOptions {
  baseURL?: string;
  timeoutMs: number;
}

// Request timeout, lock conflict and rate limiting; 5xx is handled separately.
const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export class OpenAiProvider implements AiProvider {
  private readonly clients = new Map<string, OpenAI>();

  constructor(private readonly options: OpenAiProviderOptions) {}

  async complete(request: AiRequest, signal?: AbortSignal): Promise<AiResponse> {
    const client = this.clientFor(request.api_key);
    try {
      const completion = await client.chat.completions.create(
        {
          model: request.model,
          max_tokens: request.max_tokens,
          temperature: request.temperature,
          messages: [
            { role: "system", content: request.system_prompt },
            { role: "user", content: request.content }
          ]
        },
        { signal }
      );
      return { text: completion.choices[0]?.message?.content ?? "" };
    } catch (error) {
      throw classifyProviderError(error);
    }
  }

  private clientFor(apiKey: string): OpenAI {
    let client = this.clients.get(apiKey);
    if (!client) {
      client = new OpenAI({
        apiKey,
        baseURL: this.options.baseURL,
        timeout: this.options.timeoutMs,
        // Retries are owned by the summarizer so backoff and fallbacks stay in one place.
        maxRetries: 0
      });
      this.clients.set(apiKey, client);
    }
    return client;
  }
}

/** Maps an SDK failure onto the transient/permanent split; aborts pass through untouched. */
export function classifyProviderError(error: unknown): unknown {
  if (error instanceof TransientProviderError || error instanceof PermanentProviderError) {
    return error;
  }
  if (error instanceof APIUserAbortError) {
    return error;
  }
  if (error instanceof APIConnectionError) {
    return new TransientProviderError(`AI provider unreachable: ${error.message}`, { cause: error });
  }
  if (error instanceof APIError) {
    const status = error.status;
    if (status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500) {
      return new TransientProviderError(`AI provider error ${status ?? "?"}: ${error.message}`, { status, cause: error });
    }
    return new PermanentProviderError(`AI provider rejected the request (${status}): ${error.message}`, { status, cause: error });
  }
  return new TransientProviderError(`AI provider call failed: ${describeError(error)}`, { cause: error });
}
