/**
 * Language model access over provider APIs
 */

export type {
  ILLMService,
  CompletionOptions,
  CompletionResult,
  LLMStats,
} from "./interfaces/ILLMService.js";

export {
  APILLMService,
  createAPILLMService,
  toModelError,
  DEFAULT_MODELS,
  type APIProvider,
  type APILLMServiceConfig,
} from "./api-llm-service.js";
