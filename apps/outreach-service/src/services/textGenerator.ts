import OpenAI, { ClientOptions } from "openai";

export interface GenerationPrompt {
  system: string;
  user: string;
}

export interface GenerationOptions {
  timeoutMs: number;
}

/**
 * External text-generation service used by the AI-assisted outreach path
 */
export interface TextGenerator {
  readonly name: string;
  generate(prompt: GenerationPrompt, options: GenerationOptions): Promise<string>;
}

export type GenerationErrorKind = "timeout" | "auth" | "empty_response" | "failed";

/**
 * Failure raised by a TextGenerator, classified for diagnostics
 */
export class TextGenerationError extends Error {
  constructor(public readonly kind: GenerationErrorKind, message: string) {
    super(message);
    this.name = "TextGenerationError";
  }
}

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** HTTP transport for the SDK; the global fetch when omitted */
  fetch?: ClientOptions["fetch"];
}

/**
 * Chat-completions generator. One attempt per call: SDK retries are off.
 */
export class OpenAITextGenerator implements TextGenerator {
  readonly name = "openai";
  private client: OpenAI;
  private model: string;
  private maxTokens: number;
  private temperature: number;

  constructor(options: OpenAIGeneratorOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0, fetch: options.fetch });
    this.model = options.model ?? "gpt-3.5-turbo";
    this.maxTokens = options.maxTokens ?? 400;
    this.temperature = options.temperature ?? 0.7;
  }

  async generate(prompt: GenerationPrompt, options: GenerationOptions): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        },
        { timeout: options.timeoutMs }
      );

      const content = completion.choices[0]?.message?.content;
      if (typeof content !== "string" || !content.trim()) {
        throw new TextGenerationError("empty_response", "Model returned no text");
      }
      return content.trim();
    } catch (error) {
      throw classifyOpenAIError(error);
    }
  }
}

function classifyOpenAIError(error: unknown): TextGenerationError {
  if (error instanceof TextGenerationError) return error;
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new TextGenerationError("timeout", error.message);
  }
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new TextGenerationError("auth", error.message);
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  return new TextGenerationError("failed", message);
}

/**
 * Build the configured generator, or null when no API key is set
 */
export function createTextGenerator(config: {
  openaiApiKey: string;
  openaiModel: string;
}): TextGenerator | null {
  if (!config.openaiApiKey) return null;
  return new OpenAITextGenerator({ apiKey: config.openaiApiKey, model: config.openaiModel });
}
