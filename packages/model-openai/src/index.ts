// packages/model-openai/src/index.ts
import OpenAI from 'openai';
import { childLogger, type GenerateOptions, type Logger, type ModelClient } from '@docquery/core';

export interface OpenAIModelConfig {
  apiKey?: string;
  model?: string;
  baseURL?: string;
  temperature?: number;
  maxTokens?: number;
}

export const DEFAULT_MODEL = 'gpt-4o-mini';

/** Chat-completions client; also works against OpenAI-compatible endpoints via `baseURL`. */
export class OpenAIModelClient implements ModelClient {
  readonly name: string;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;
  private readonly log: Logger;

  constructor(cfg: OpenAIModelConfig = {}, logger?: Logger) {
    this.model = cfg.model ?? DEFAULT_MODEL;
    this.name = `openai:${this.model}`;
    this.temperature = cfg.temperature;
    this.maxTokens = cfg.maxTokens;
    this.client = new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL });
    this.log = logger ?? childLogger('model-openai');
  }

  // Provider errors propagate; the synthesizer wraps them.
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: options.temperature ?? this.temperature,
      max_tokens: options.maxTokens ?? this.maxTokens,
      messages: [{ role: 'user', content: prompt }]
    });
    const content = completion.choices[0]?.message?.content ?? '';
    this.log.debug({ model: this.model, chars: content.length, usage: completion.usage }, 'completion-received');
    return content;
  }
}

export default OpenAIModelClient;
