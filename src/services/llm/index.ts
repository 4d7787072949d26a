/**
 * LLM field-extraction service
 */

export { OllamaClient, OllamaApiError, type TextGenerator, type GenerateResponse } from './client.js';
export { type OllamaConfig, loadOllamaConfig, OLLAMA_MODELS } from './config.js';
export { CircuitBreaker, CircuitBreakerOpenError, CircuitState, isServerError } from './circuit-breaker.js';
export {
  DocumentTypeRegistry,
  type DocumentTypeConfig,
  fieldTypeOf,
  FIELD_TYPES,
} from './document-types.js';
export {
  LlmFieldExtractor,
  type FieldExtractor,
  type FieldExtractionOptions,
  buildExtractionPrompt,
  extractJsonFromResponse,
} from './field-extractor.js';
export { cleanValue, parseLocaleNumber, validateField, validateExtractedFields } from './validation.js';
