import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";

import { getLLMProvider, type Config } from "./config.js";
import { GenerationError, errorMessage } from "./errors.js";
import type { CompletionOptions, LLMProvider } from "./types.js";

const RETRY_DELAY_MS = 1000;

const chatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    })
  ),
});

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Thrown for a single attempt; decides whether a retry is worth it
 */
class AttemptError extends Error {
  constructor(
    message: string,
    readonly transient: boolean,
    readonly status?: number
  ) {
    super(message);
  }
}

export interface OpenRouterProviderOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  retryDelayMs?: number;
}

/**
 * OpenRouter chat-completions provider.
 * Retries once on a 5xx or a dropped connection, never on anything else.
 */
export class OpenRouterProvider implements LLMProvider {
  readonly name = "openrouter";
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly retryDelayMs: number;

  constructor(options: OpenRouterProviderOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = (options.baseUrl ?? "https://openrouter.ai/api/v1").replace(/\/+$/, "");
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    try {
      return await this.attempt(prompt, options);
    } catch (error) {
      if (!(error instanceof AttemptError)) throw error;
      if (!error.transient) {
        throw new GenerationError(error.message, { status: error.status });
      }

      console.warn(`OpenRouter request failed, retrying in ${this.retryDelayMs}ms: ${error.message}`);
      await sleep(this.retryDelayMs);
    }

    try {
      return await this.attempt(prompt, options);
    } catch (error) {
      if (error instanceof AttemptError) {
        throw new GenerationError(error.message, { status: error.status });
      }
      throw error;
    }
  }

  private async attempt(prompt: string, options: CompletionOptions): Promise<string> {
    const messages = [
      ...(options.system ? [{ role: "system", content: options.system }] : []),
      { role: "user", content: prompt },
    ];

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: options.temperature,
          max_tokens: options.maxTokens,
          top_p: 0.95,
        }),
      });
    } catch (error) {
      throw new AttemptError(`OpenRouter request failed: ${errorMessage(error)}`, true);
    }

    if (!response.ok) {
      let body: string;
      try {
        body = (await response.text()).slice(0, 200);
      } catch (error) {
        // Connection dropped after the headers
        throw new AttemptError(
          `OpenRouter error ${response.status}: response body unreadable (${errorMessage(error)})`,
          true,
          response.status
        );
      }
      throw new AttemptError(
        `OpenRouter error ${response.status}: ${body}`,
        response.status >= 500,
        response.status
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new AttemptError("OpenRouter returned malformed JSON", false, response.status);
    }

    const parsed = chatCompletionSchema.safeParse(json);
    if (!parsed.success || parsed.data.choices.length === 0) {
      throw new AttemptError("Empty choices in OpenRouter response", false, response.status);
    }

    const content = parsed.data.choices[0]?.message.content ?? "";
    if (!content.trim()) {
      throw new AttemptError("Empty content in OpenRouter response", false, response.status);
    }

    return content;
  }
}

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
}

/**
 * Anthropic/Claude LLM provider
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic";
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(options: AnthropicProviderOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      maxRetries: 1,
    });
    this.model = options.model;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await this.client.messages
      .create({
        model: this.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        ...(options.system ? { system: options.system } : {}),
        messages: [{ role: "user", content: prompt }],
      })
      .catch((error: unknown) => {
        const status = error instanceof Anthropic.APIError ? error.status : undefined;
        throw new GenerationError(`Anthropic request failed: ${errorMessage(error)}`, {
          status,
          cause: error,
        });
      });

    const content = response.content[0];
    if (content?.type === "text" && content.text.trim()) {
      return content.text;
    }

    throw new GenerationError("Unexpected response type from Anthropic");
  }
}

/**
 * Create LLM provider based on configuration
 */
export function createProvider(config: Config): LLMProvider {
  if (getLLMProvider(config) === "openrouter" && config.openrouterApiKey) {
    return new OpenRouterProvider({
      apiKey: config.openrouterApiKey,
      model: config.openrouterModel,
      baseUrl: config.openrouterBaseUrl,
    });
  }

  if (config.anthropicApiKey) {
    return new AnthropicProvider({
      apiKey: config.anthropicApiKey,
      model: config.anthropicModel,
    });
  }

  throw new GenerationError("No LLM provider configured");
}
