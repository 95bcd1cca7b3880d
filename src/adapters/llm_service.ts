/**
 * @fileoverview Reasoning backend contract
 *
 * The orchestration core only needs "send messages, get text back" plus a
 * reachability probe. Provider specifics live in the implementations.
 */

export interface LlmChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmChatOptions {
  messages: LlmChatMessage[];
  modelId?: string;
  /** Aborting kills the underlying call. */
  signal?: AbortSignal;
}

export interface LlmChatResult {
  content: string;
  provider: string;
}

export interface BackendHealth {
  provider: string;
  available: boolean;
  authenticated: boolean;
  /** Epoch ms of the probe; 0 when never probed. */
  lastCheck: number;
  error?: string;
}

export interface ReasoningBackend {
  readonly provider: string;
  readonly modelId: string;
  chat(options: LlmChatOptions): Promise<LlmChatResult>;
  checkHealth(forceCheck?: boolean): Promise<BackendHealth>;
}

export function buildInitialHealth(provider: string): BackendHealth {
  return {
    provider,
    available: false,
    authenticated: false,
    lastCheck: 0,
  };
}
