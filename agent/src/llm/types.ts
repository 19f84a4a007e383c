/**
 * LLM Type Definitions
 *
 * Pure types for the chat client. No runtime values.
 */

// ============================================
// CORE TYPES
// ============================================

export type LLMProvider = "gemini";

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
  /** Base64-encoded images attached to this message */
  images?: Array<{ base64: string; mediaType: "image/jpeg" | "image/png" }>;
}

export interface LLMRequestOptions {
  model?: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  provider: LLMProvider;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMStreamChunk {
  content: string;
  done: boolean;
}

// ============================================
// LLM CLIENT INTERFACE
// ============================================

export interface ILLMClient {
  provider: LLMProvider;

  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;

  stream(
    messages: LLMMessage[],
    options?: LLMRequestOptions
  ): AsyncGenerator<LLMStreamChunk, void, unknown>;
}

export interface LLMClientOptions {
  apiKey: string;
  baseUrl?: string;
  defaultModel?: string;
}
