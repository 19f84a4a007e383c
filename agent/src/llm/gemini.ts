/**
 * Gemini LLM Client
 *
 * Uses the Google Generative AI REST API (generateContent).
 * System messages go in a separate `systemInstruction` field; the model
 * role is "model", not "assistant".
 */

import { createComponentLogger } from "../logging.js";
import { LLMApiError } from "../core/errors.js";
import { isRecord, numberField } from "../core/validate.js";
import type {
  ILLMClient,
  LLMClientOptions,
  LLMMessage,
  LLMRequestOptions,
  LLMResponse,
  LLMStreamChunk,
  LLMProvider,
} from "./types.js";

const log = createComponentLogger("llm.gemini");

export const GEMINI_DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com";
export const GEMINI_DEFAULT_MODEL = "gemini-2.0-flash-exp";

// ============================================
// FORMAT HELPERS
// ============================================

type GeminiPart = { text: string } | { inlineData: { mimeType: string; data: string } };

interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

interface GeminiRequestBody {
  contents: GeminiContent[];
  generationConfig: {
    temperature: number;
    topP?: number;
    maxOutputTokens: number;
  };
  systemInstruction?: { parts: Array<{ text: string }> };
}

/**
 * Convert LLMMessages to Gemini contents format.
 * System messages are extracted separately for systemInstruction.
 */
function formatContentsForGemini(messages: LLMMessage[]): GeminiContent[] {
  const contents: GeminiContent[] = [];

  for (const m of messages) {
    if (m.role === "system") continue; // Handled as systemInstruction

    const parts: GeminiPart[] = [];
    if (m.content) parts.push({ text: m.content });
    for (const img of m.images ?? []) {
      parts.push({ inlineData: { mimeType: img.mediaType, data: img.base64 } });
    }
    // Gemini rejects a content with no parts
    if (parts.length === 0) parts.push({ text: "" });

    contents.push({ role: m.role === "assistant" ? "model" : "user", parts });
  }

  return contents;
}

function extractSystemInstruction(messages: LLMMessage[]): string | null {
  const systemMsgs = messages.filter(m => m.role === "system");
  if (systemMsgs.length === 0) return null;
  return systemMsgs.map(m => m.content).join("\n\n");
}

/** Concatenated text of the first candidate's parts */
export function extractCandidateText(data: unknown): string | null {
  if (!isRecord(data) || !Array.isArray(data.candidates)) return null;
  const candidate: unknown = data.candidates[0];
  if (!isRecord(candidate) || !isRecord(candidate.content) || !Array.isArray(candidate.content.parts)) {
    return null;
  }
  let text = "";
  for (const part of candidate.content.parts) {
    if (isRecord(part) && typeof part.text === "string") text += part.text;
  }
  return text;
}

function extractUsage(data: unknown): LLMResponse["usage"] {
  const usage: Record<string, unknown> = isRecord(data) && isRecord(data.usageMetadata) ? data.usageMetadata : {};
  return {
    inputTokens: numberField(usage, "promptTokenCount", 0),
    outputTokens: numberField(usage, "candidatesTokenCount", 0),
  };
}

function summarizeMessages(messages: LLMMessage[]): Array<{ role: string; content: string }> {
  return messages.map(m => ({
    role: m.role,
    content: m.content.substring(0, 500) + (m.content.length > 500 ? "..." : ""),
  }));
}

// ============================================
// GEMINI CLIENT
// ============================================

export class GeminiClient implements ILLMClient {
  provider: LLMProvider = "gemini";
  private apiKey: string;
  private baseUrl: string;
  private defaultModel: string;

  constructor(options: LLMClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl || GEMINI_DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.defaultModel = options.defaultModel || GEMINI_DEFAULT_MODEL;
  }

  private buildBody(messages: LLMMessage[], options?: LLMRequestOptions): GeminiRequestBody {
    const body: GeminiRequestBody = {
      contents: formatContentsForGemini(messages),
      generationConfig: {
        temperature: options?.temperature ?? 0.7,
        maxOutputTokens: options?.maxTokens ?? 300,
      },
    };
    if (options?.topP !== undefined) body.generationConfig.topP = options.topP;

    const systemInstruction = extractSystemInstruction(messages);
    if (systemInstruction) {
      body.systemInstruction = { parts: [{ text: systemInstruction }] };
    }
    return body;
  }

  private async post(url: string, body: GeminiRequestBody): Promise<Response> {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "x-goog-api-key": this.apiKey,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      log.error(`API error ${response.status}`, { error: errorText.substring(0, 500) });
      throw new LLMApiError("Gemini", response.status, errorText.substring(0, 500));
    }
    return response;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;
    log.info(`LLM Request`, { provider: "gemini", model, messages: summarizeMessages(messages) });

    const url = `${this.baseUrl}/v1beta/models/${model}:generateContent`;
    const response = await this.post(url, this.buildBody(messages, options));

    const data: unknown = await response.json();
    const content = extractCandidateText(data);
    if (content === null) {
      throw new Error("Gemini response missing content parts");
    }

    return { content, model, provider: "gemini", usage: extractUsage(data) };
  }

  async *stream(
    messages: LLMMessage[],
    options?: LLMRequestOptions
  ): AsyncGenerator<LLMStreamChunk, void, unknown> {
    const model = options?.model || this.defaultModel;
    log.info(`LLM Stream Request`, { provider: "gemini", model, messages: summarizeMessages(messages) });

    // Gemini streaming uses streamGenerateContent with alt=sse
    const url = `${this.baseUrl}/v1beta/models/${model}:streamGenerateContent?alt=sse`;
    const response = await this.post(url, this.buildBody(messages, options));

    const reader = response.body?.getReader();
    if (!reader) throw new Error("No response body");

    const decoder = new TextDecoder();
    let buffer = "";
    let finished = false;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          break;
        }

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split("\n");
        buffer = lines.pop() || "";

        for (const line of lines) {
          if (!line.startsWith("data: ")) continue;
          let parsed: unknown;
          try {
            parsed = JSON.parse(line.slice(6));
          } catch {
            log.debug("Skipping non-JSON SSE line");
            continue;
          }
          const text = extractCandidateText(parsed);
          if (text) yield { content: text, done: false };
        }
      }
    } finally {
      // The consumer stopped early; drop the rest of the response
      if (!finished) await reader.cancel().catch(() => undefined);
    }

    yield { content: "", done: true };
  }
}
