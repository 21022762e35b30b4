export { InferenceError, isInferenceError } from './errors.js';
export {
  OllamaInferenceClient,
  createInferenceClient,
  matchesModel,
  type InferenceClient,
  type OllamaClientOptions,
} from './inference-client.js';
export { buildRepairPrompt, type RepairPrompt } from './prompt.js';
export {
  normalizeResponse,
  normalizeCode,
  stripCodeFences,
  extractFencedBlock,
  isDoubleEscaped,
  unescapeCode,
  looksLikeCode,
  patchResponseSchema,
  type ParsedPatch,
  type NormalizeResult,
  type PatchResponse,
} from './response-normalizer.js';
export {
  FALLBACK_RULES,
  applyFallbackRule,
  reindent,
  type FallbackFix,
  type FallbackRule,
} from './fallback-rules.js';
export { PatchGenerator, type PatchGeneratorOptions } from './patch-generator.js';
