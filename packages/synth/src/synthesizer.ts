// packages/synth/src/synthesizer.ts
import {
  ModelInvocationError, childLogger, errorMessage,
  type GenerateOptions, type Logger, type ModelClient
} from '@docquery/core';

// Low temperature keeps repeated requests close to each other.
export const DEFAULT_GENERATE_OPTIONS: Required<GenerateOptions> = { temperature: 0.1, maxTokens: 2000 };

export class QuerySynthesizer {
  private readonly log: Logger;
  private readonly options: Required<GenerateOptions>;

  constructor(
    private readonly model: ModelClient | undefined,
    options: GenerateOptions = {},
    logger?: Logger
  ) {
    this.options = { ...DEFAULT_GENERATE_OPTIONS, ...options };
    this.log = logger ?? childLogger('synthesizer');
  }

  async synthesize(prompt: string): Promise<string> {
    if (!this.model) {
      throw new ModelInvocationError('No language model configured');
    }

    const t0 = Date.now();
    let raw: unknown;
    try {
      raw = await this.model.generate(prompt, this.options);
    } catch (e) {
      this.log.error({ err: e, model: this.model.name }, 'model-invocation-failed');
      throw new ModelInvocationError(`Language model call failed: ${errorMessage(e)}`, e);
    }

    if (typeof raw !== 'string') {
      throw new ModelInvocationError(`Language model returned ${raw === null ? 'null' : typeof raw} instead of text`);
    }

    this.log.debug({ model: this.model.name, ms: Date.now() - t0, length: raw.length }, 'model-response');
    return raw;
  }
}
