/**
 * Text generation through OpenRouter's OpenAI-compatible API
 */

import OpenAI from "openai";
import { getConfig } from "../../config/env";
import { logger } from "../logger";

export interface GenerationOptions {
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface GeneratedText {
  text: string;
  model: string;
}

export interface TextGenerator {
  readonly model: string;
  generate(prompt: string, options?: GenerationOptions): Promise<GeneratedText>;
}

const SYSTEM_PROMPT =
  "You are an expert video game achievement guide writer. You write accurate, practical guides and answer with JSON only.";

export class OpenRouterGenerator implements TextGenerator {
  constructor(
    private readonly client: OpenAI,
    readonly model: string,
    private readonly defaults: { maxTokens: number; temperature: number }
  ) {}

  async generate(prompt: string, options: GenerationOptions = {}): Promise<GeneratedText> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        max_tokens: options.maxTokens ?? this.defaults.maxTokens,
        temperature: this.defaults.temperature,
      },
      { signal: options.signal }
    );

    const text = completion.choices[0]?.message?.content ?? "";
    logger.debug(`Generated ${text.length} chars with ${completion.model || this.model}`);
    return { text, model: completion.model || this.model };
  }
}

/**
 * Lazy-initialized generator; null when no API key is configured
 */
let generator: OpenRouterGenerator | null = null;

export function getTextGenerator(): TextGenerator | null {
  const config = getConfig();
  if (!config.OPENROUTER_API_KEY) {
    return null;
  }

  if (!generator) {
    const client = new OpenAI({
      apiKey: config.OPENROUTER_API_KEY,
      baseURL: config.OPENROUTER_BASE_URL,
    });
    generator = new OpenRouterGenerator(client, config.OPENROUTER_MODEL, {
      maxTokens: config.OPENROUTER_MAX_TOKENS,
      temperature: config.OPENROUTER_TEMPERATURE,
    });
  }
  return generator;
}
