/**
 * Response Controller
 *
 * Owns the live conversation: literal history, generation state and the
 * last reply. Each exchange builds a fresh context, asks the LLM (streamed
 * or single-shot), cleans the reply, then records it in history, the memory
 * store and the tag controller.
 *
 * Provider failures never propagate. The caller always gets a reply; on
 * failure it is FALLBACK_REPLY and the state becomes "error".
 */

import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import type { ILLMClient, LLMMessage, LLMRequestOptions } from "../llm/types.js";
import type { HistoryEntry } from "../prompt/context-builder.js";
import { postProcess, type PostProcessOptions } from "./post-process.js";

const log = createComponentLogger("conversation");

export const FALLBACK_REPLY = "I'm having trouble thinking right now. Could you try again?";

// ============================================
// TYPES
// ============================================

export type GenerationState = "idle" | "generating" | "error";

export interface ContextSource {
  messages(input: string, userId: string, history: readonly HistoryEntry[]): LLMMessage[];
}

export interface TurnSink {
  storeTurn(userId: string, userText: string, aiText: string, platform?: string, sessionId?: string): number;
}

export interface TagSink {
  processMessage(message: string): Promise<string[]>;
}

export interface GenerationSettings {
  model?: string;
  temperature: number;
  topP: number;
  maxTokens: number;
}

export interface ResponseControllerOptions {
  client: ILLMClient;
  context: ContextSource;
  memory?: TurnSink;
  tags?: TagSink;
  userId: string;
  generation: GenerationSettings;
  streaming: boolean;
  output: PostProcessOptions;
}

export interface SendOptions {
  userId?: string;
  platform?: string;
  sessionId?: string;
  /** Called with each streamed chunk as it arrives */
  onChunk?: (text: string) => void;
  images?: LLMMessage["images"];
}

export interface ConversationStats {
  totalExchanges: number;
  state: GenerationState;
  isGenerating: boolean;
  lastMessageStreamed: boolean;
  model: string;
  maxTokens: number;
}

// ============================================
// CONTROLLER
// ============================================

export class ResponseController {
  private history: HistoryEntry[] = [];
  private lastResponse = "";
  private streamed = false;
  private stopRequested = false;
  private currentState: GenerationState = "idle";
  private readonly generation: GenerationSettings;
  /** Serializes exchanges from the dispatcher and the web surface */
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: ResponseControllerOptions) {
    this.generation = { ...options.generation };
  }

  get state(): GenerationState {
    return this.currentState;
  }

  get lastMessageStreamed(): boolean {
    return this.streamed;
  }

  sendMessage(text: string, options: SendOptions = {}): Promise<string> {
    return this.exclusive(() => this.exchange(text, options));
  }

  /**
   * Drop the last AI reply and send the user message before it again.
   * Null when there is nothing to regenerate.
   */
  regenerateLast(options: SendOptions = {}): Promise<string | null> {
    return this.exclusive(async () => {
      const last = this.history.at(-1);
      const previous = this.history.at(-2);
      if (last?.role !== "assistant" || previous?.role !== "user") {
        log.debug("Nothing to regenerate");
        return null;
      }
      // exchange() appends the user turn again
      this.history.splice(-2, 2);
      return this.exchange(previous.content, options);
    });
  }

  /** Consumed at the next stream chunk; single-shot calls run to completion */
  stopGeneration(): void {
    if (this.currentState === "generating") this.stopRequested = true;
  }

  setMaxTokens(maxTokens: number): void {
    if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
      log.warn("Ignoring invalid max tokens", { maxTokens });
      return;
    }
    this.generation.maxTokens = maxTokens;
  }

  clearHistory(): void {
    this.history = [];
    log.info("Conversation history cleared");
  }

  getHistory(): HistoryEntry[] {
    return this.history.map(entry => ({ ...entry }));
  }

  getLastResponse(): string {
    return this.lastResponse;
  }

  getStats(): ConversationStats {
    return {
      totalExchanges: Math.floor(this.history.length / 2),
      state: this.currentState,
      isGenerating: this.currentState === "generating",
      lastMessageStreamed: this.streamed,
      model: this.generation.model ?? "default",
      maxTokens: this.generation.maxTokens,
    };
  }

  // ============================================
  // INTERNALS
  // ============================================

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async exchange(text: string, options: SendOptions): Promise<string> {
    const userId = options.userId ?? this.options.userId;
    const prior = [...this.history];
    this.history.push({ role: "user", content: text });

    const messages = this.options.context.messages(text, userId, prior);
    if (options.images?.length) {
      const last = messages.at(-1);
      if (last) last.images = options.images;
    }

    this.currentState = "generating";
    this.stopRequested = false;
    this.streamed = false;
    let reply: string;

    try {
      const raw = this.options.streaming
        ? await this.streamReply(messages, options.onChunk)
        : (await this.options.client.chat(messages, this.requestOptions())).content;
      reply = postProcess(raw, this.options.output);
      this.currentState = "idle";
    } catch (err) {
      log.error("Error generating response", err);
      reply = FALLBACK_REPLY;
      this.streamed = false;
      this.currentState = "error";
    } finally {
      this.stopRequested = false;
    }

    this.history.push({ role: "assistant", content: reply });
    this.lastResponse = reply;
    log.debug(`Response generated: ${reply.length} characters`, { streamed: this.streamed });

    await this.record(userId, text, reply, options);
    return reply;
  }

  private async streamReply(messages: LLMMessage[], onChunk?: (text: string) => void): Promise<string> {
    let text = "";
    for await (const chunk of this.options.client.stream(messages, this.requestOptions())) {
      if (this.stopRequested) {
        log.info("Generation stopped by request");
        break;
      }
      if (!chunk.content) continue;
      text += chunk.content;
      this.lastResponse = text;
      this.streamed = true;
      onChunk?.(chunk.content);
    }
    return text;
  }

  private requestOptions(): LLMRequestOptions {
    return {
      model: this.generation.model,
      temperature: this.generation.temperature,
      topP: this.generation.topP,
      maxTokens: this.generation.maxTokens,
    };
  }

  private async record(userId: string, text: string, reply: string, options: SendOptions): Promise<void> {
    this.options.memory?.storeTurn(userId, text, reply, options.platform ?? "local", options.sessionId);
    if (!this.options.tags) return;
    try {
      await this.options.tags.processMessage(text);
    } catch (err) {
      log.warn("Tag processing failed", { error: errorMessage(err) });
    }
  }
}
