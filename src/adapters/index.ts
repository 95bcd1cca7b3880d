export type {
  BackendHealth,
  LlmChatMessage,
  LlmChatOptions,
  LlmChatResult,
  ReasoningBackend,
} from './llm_service.js';
export { buildInitialHealth } from './llm_service.js';
export { CliReasoningBackend, createReasoningBackend } from './cli_llm_service.js';
export type { CliProvider, CliReasoningBackendOptions } from './cli_llm_service.js';
export { requestCompletion, requestStructured } from './backend_request.js';
export type { BackendRequest, BackendResult } from './backend_request.js';
