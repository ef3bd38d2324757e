export { buildPrompt, type PromptInput } from './prompt.js';
export { QuerySynthesizer, DEFAULT_GENERATE_OPTIONS } from './synthesizer.js';
export {
  extractQuerySpec, locateJsonObject, parseJsonObject,
  type ExtractOptions, type ExtractionTier
} from './extract.js';
export { validateQuerySpec } from './validate.js';
