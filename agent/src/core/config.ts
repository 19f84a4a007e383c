/**
 * Companion Configuration
 *
 * Typed, immutable settings read from the environment once at startup and
 * passed by reference to every subsystem. Nothing reads process.env after
 * the bootstrap.
 */

import path from "path";
import { createComponentLogger } from "../logging.js";
import { ConfigError } from "./errors.js";

const log = createComponentLogger("config");

export type EmbeddingScheme = "tfidf" | "features";

export interface Settings {
  llm: {
    apiKey: string;
    model: string;
    baseUrl: string;
    temperature: number;
    topP: number;
    maxOutputTokens: number;
    streamChats: boolean;
  };
  output: {
    removeAsterisks: boolean;
    rpSuppression: boolean;
    newlineCut: boolean;
  };
  memory: {
    ragEnabled: boolean;
    embeddingScheme: EmbeddingScheme;
    similarityThreshold: number;
    contextBudgetChars: number;
  };
  features: {
    lorebook: boolean;
    autoTagging: boolean;
    retrospect: boolean;
    hangout: boolean;
    alarms: boolean;
    vtube: boolean;
    semiAutoChat: boolean;
  };
  web: {
    enabled: boolean;
    port: number;
  };
  paths: {
    configDir: string;
    dataDir: string;
    characterCard: string;
    databaseFile: string;
    legacyLog: string;
    /** Image served to Main-View-Image and hangout vision; unset means no camera */
    imageFile?: string;
  };
  userId: string;
  charName?: string;
}

// ============================================
// PARSERS
// ============================================

function readBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw.trim().toLowerCase() === "true";
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    log.warn(`Invalid number for ${key}, using default`, { value: raw, fallback });
    return fallback;
  }
  return value;
}

function readScheme(env: NodeJS.ProcessEnv): EmbeddingScheme {
  const raw = (env.EMBEDDING_SCHEME || "tfidf").toLowerCase();
  if (raw === "tfidf" || raw === "features") return raw;
  log.warn("Unknown EMBEDDING_SCHEME, using tfidf", { value: raw });
  return "tfidf";
}

// ============================================
// LOADING
// ============================================

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const configDir = env.CONFIG_DIR || "Configurables";
  const dataDir = env.DATA_DIR || "data";

  return {
    llm: {
      apiKey: env.GEMINI_API_KEY || env.GOOGLE_GEMINI_API_KEY || "",
      model: env.GEMINI_MODEL || "gemini-2.0-flash-exp",
      baseUrl: env.GEMINI_BASE_URL || "https://generativelanguage.googleapis.com",
      temperature: readNumber(env, "TEMPERATURE", 0.7),
      topP: readNumber(env, "TOP_P", 0.9),
      maxOutputTokens: readNumber(env, "MAX_TOKENS", 300),
      streamChats: readBool(env, "STREAM_CHATS", true),
    },
    output: {
      removeAsterisks: readBool(env, "REMOVE_ASTERISKS", true),
      rpSuppression: readBool(env, "RP_SUPPRESSION", true),
      newlineCut: readBool(env, "NEWLINE_CUT", true),
    },
    memory: {
      ragEnabled: readBool(env, "RAG_ENABLED", true),
      embeddingScheme: readScheme(env),
      similarityThreshold: readNumber(env, "SIMILARITY_THRESHOLD", 0.3),
      contextBudgetChars: readNumber(env, "CONTEXT_BUDGET_CHARS", 8000),
    },
    features: {
      lorebook: readBool(env, "LOREBOOK_ENABLED", true),
      autoTagging: readBool(env, "AUTO_TAGGING_ENABLED", true),
      retrospect: readBool(env, "RETROSPECT_ENABLED", true),
      hangout: readBool(env, "HANGOUT_ENABLED", true),
      alarms: readBool(env, "ALARMS_ENABLED", true),
      vtube: readBool(env, "VTUBE_ENABLED", false),
      semiAutoChat: readBool(env, "SEMI_AUTO_CHAT", false),
    },
    web: {
      enabled: readBool(env, "WEB_UI_ENABLED", true),
      port: readNumber(env, "WEB_UI_PORT", 5000),
    },
    paths: {
      configDir,
      dataDir,
      characterCard: env.CHARACTER_CARD_PATH || path.join(configDir, "CharacterCards", "default.json"),
      databaseFile: path.join(dataDir, "companion.db"),
      legacyLog: env.LIVE_LOG_PATH || "LiveLog.json",
      imageFile: env.IMAGE_PATH || undefined,
    },
    userId: env.USER_ID || "local-user",
    charName: env.CHAR_NAME || undefined,
  };
}

/**
 * Startup validation. Throws ConfigError for anything the process cannot
 * run without; the bootstrap turns that into exit code 1.
 */
export function validateSettings(settings: Settings): void {
  if (!settings.llm.apiKey) {
    throw new ConfigError("GEMINI_API_KEY is not set. Add it to .env or the environment.");
  }
  if (settings.web.port <= 0 || settings.web.port > 65535) {
    throw new ConfigError(`WEB_UI_PORT out of range: ${settings.web.port}`);
  }
  if (settings.memory.similarityThreshold < 0 || settings.memory.similarityThreshold > 1) {
    throw new ConfigError(`SIMILARITY_THRESHOLD must be within 0..1 (got ${settings.memory.similarityThreshold})`);
  }
}
