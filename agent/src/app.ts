/**
 * Companion Bootstrap
 *
 * Builds every subsystem in dependency order and owns their lifecycles:
 * database → memory → persona, tasks, lorebook, tags → LLM client →
 * response controller → dispatcher and handlers → background tasks →
 * web surface → foreground loop. shutdown() stops them in reverse.
 */

import * as path from "path";
import { createComponentLogger, getAgentLogger } from "./logging.js";
import type { Settings } from "./core/config.js";
import { errorMessage } from "./core/errors.js";
import { openDatabase, closeDatabase, type CompanionDatabase } from "./db/index.js";
import { createEmbedder } from "./embedding/index.js";
import { MemoryStore, SqliteMemoryRepository, InMemoryRepository, type MemoryRepository } from "./memory/index.js";
import { CharacterCardStore } from "./persona/character-card.js";
import { TaskProfiles } from "./persona/task-profiles.js";
import { Lorebook } from "./lorebook/lorebook.js";
import { TagController } from "./tags/tag-controller.js";
import { GeminiClient } from "./llm/gemini.js";
import { ContextBuilder } from "./prompt/context-builder.js";
import { ResponseController } from "./conversation/response-controller.js";
import { PipeDispatcher } from "./pipes/dispatcher.js";
import { createPipeHandlers } from "./pipes/handlers.js";
import { AlarmStore } from "./alarms/store.js";
import { AlarmChecker } from "./alarms/checker.js";
import { RetrospectAnalyzer } from "./retrospect/analyzer.js";
import { HangoutMode, hangoutConfigPath, loadHangoutConfig } from "./hangout/hangout.js";
import { PeriodicManager, type PeriodicTaskDef } from "./periodic/manager.js";
import { createWebApp } from "./web/routes.js";
import { startWebServer, type WebServerHandle } from "./web/server.js";
import { ControlLoop } from "./foreground/control-loop.js";
import { TerminalInput, loadHotkeys } from "./collaborators/terminal.js";
import { ConsoleDisplay, ConsoleSpeech, FileImageSource, LoggingAvatar, NullImageSource } from "./collaborators/console.js";
import { loadImage } from "./collaborators/image-file.js";

const log = createComponentLogger("app");

const TAG_DECAY_INTERVAL_MS = 300_000;
const RAG_SYNC_INTERVAL_MS = 600_000;

export interface CompanionOptions {
  /** Hard exit used by the kill phrase; defaults to process.exit */
  exit?: (code: number) => void;
  /** Terminal input stream; defaults to stdin */
  input?: NodeJS.ReadableStream;
}

export interface Companion {
  settings: Settings;
  /** Resolves when the foreground loop ends */
  run(): Promise<void>;
  shutdown(): Promise<void>;
}

// ============================================
// STORAGE
// ============================================

function openRepository(settings: Settings): { db: CompanionDatabase | null; repository: MemoryRepository } {
  try {
    const db = openDatabase(settings.paths.databaseFile);
    return { db, repository: new SqliteMemoryRepository(db) };
  } catch (err) {
    log.error("Database unavailable; running memory-only", err, { file: settings.paths.databaseFile });
    return { db: null, repository: new InMemoryRepository() };
  }
}

// ============================================
// BOOTSTRAP
// ============================================

export async function createCompanion(settings: Settings, options: CompanionOptions = {}): Promise<Companion> {
  const { configDir, dataDir } = settings.paths;
  const { features } = settings;

  // Storage and memory
  const { db, repository } = openRepository(settings);
  const memory = new MemoryStore({
    embedder: createEmbedder(settings.memory.embeddingScheme),
    repository,
    similarityThreshold: settings.memory.similarityThreshold,
    contextBudgetChars: settings.memory.contextBudgetChars,
  });
  await memory.importLegacyLog(settings.paths.legacyLog, settings.userId);
  memory.initialize();

  // Persona and knowledge
  const persona = new CharacterCardStore(settings.paths.characterCard);
  await persona.load();
  const characterName = () => settings.charName ?? persona.name();

  const tasks = new TaskProfiles(path.join(configDir, "Tasks"));
  await tasks.load();

  const lorebook = new Lorebook(path.join(configDir, "Lorebook"), { enabled: features.lorebook });
  await lorebook.load();

  const tags = new TagController({
    dir: path.join(configDir, "Tags"),
    automaticTagging: features.autoTagging,
    taskSelector: tasks,
  });
  await tags.load();

  // Generation
  const client = new GeminiClient({
    apiKey: settings.llm.apiKey,
    baseUrl: settings.llm.baseUrl,
    defaultModel: settings.llm.model,
  });

  const retrospect = new RetrospectAnalyzer({
    dir: path.join(dataDir, "retrospect"),
    client,
    turns: memory,
    enabled: features.retrospect,
  });
  await retrospect.load();

  const context = new ContextBuilder(
    {
      persona,
      tasks,
      tags,
      lorebook,
      memory: settings.memory.ragEnabled ? memory : undefined,
      insights: retrospect,
      characterName,
    },
    { budgetChars: settings.memory.contextBudgetChars },
  );

  const conversation = new ResponseController({
    client,
    context,
    memory,
    tags,
    userId: settings.userId,
    generation: {
      model: settings.llm.model,
      temperature: settings.llm.temperature,
      topP: settings.llm.topP,
      maxTokens: settings.llm.maxOutputTokens,
    },
    streaming: settings.llm.streamChats,
    output: settings.output,
  });

  // Collaborators
  const terminal = new TerminalInput({ bindings: await loadHotkeys(configDir), input: options.input });
  const display = new ConsoleDisplay();
  const speech = new ConsoleSpeech();
  const images = settings.paths.imageFile ? new FileImageSource(settings.paths.imageFile) : new NullImageSource();
  const speak = (text: string) => speech.speak(text);

  // Alarms and hangout
  const alarmStore = new AlarmStore(path.join(configDir, "Alarms", "alarms.json"));
  await alarmStore.load();
  const alarms = new AlarmChecker({
    store: alarmStore,
    wake: prompt => conversation.sendMessage(prompt, { platform: "alarm" }),
    speak,
  });

  const hangout = new HangoutMode(
    {
      transcribe: () => terminal.transcribe(),
      send: async (prompt, imagePath) => {
        const attachments = imagePath ? [await loadImage(imagePath)] : undefined;
        return conversation.sendMessage(prompt, { platform: "hangout", images: attachments });
      },
      speak,
      capture: () => images.capture(),
    },
    {
      config: await loadHangoutConfig(configDir),
      configPath: hangoutConfigPath(configDir),
      enabled: features.hangout,
      characterName: characterName(),
    },
  );

  // Dispatcher
  const { handlers } = createPipeHandlers({
    conversation,
    stt: terminal,
    tts: speech,
    display,
    images,
    avatar: new LoggingAvatar(),
    tags,
    alarms: features.alarms ? alarms : undefined,
    hangout,
    characterName,
    avatarEnabled: features.vtube,
    output: settings.output,
    exit: options.exit ?? (code => process.exit(code)),
  });
  const dispatcher = new PipeDispatcher(handlers);
  dispatcher.start();

  // Background tasks
  const periodic = new PeriodicManager();
  const backgroundTasks: PeriodicTaskDef[] = [
    alarms.getPeriodicTaskDef(features.alarms),
    {
      id: "tag-decay",
      name: "Tag decay",
      intervalMs: TAG_DECAY_INTERVAL_MS,
      initialDelayMs: TAG_DECAY_INTERVAL_MS,
      enabled: true,
      bypassIdleCheck: true,
      run: async () => {
        await tags.decay();
      },
    },
    {
      id: "rag-sync",
      name: "RAG sync",
      intervalMs: RAG_SYNC_INTERVAL_MS,
      initialDelayMs: RAG_SYNC_INTERVAL_MS,
      enabled: settings.memory.ragEnabled,
      bypassIdleCheck: true,
      run: async () => {
        const read = memory.syncFromLog();
        if (read > 0) log.debug(`Synced ${read} turns from the log`);
      },
    },
    retrospect.getPeriodicTaskDef(),
  ];
  periodic.start(backgroundTasks);

  // Foreground
  const loop = new ControlLoop({
    commands: terminal,
    dispatcher,
    display,
    tts: speech,
    activity: periodic,
    semiAutoChat: features.semiAutoChat,
  });

  // Web surface
  let web: WebServerHandle | null = null;
  if (settings.web.enabled) {
    const app = createWebApp({
      dispatcher,
      conversation,
      speak,
      logs: count => getAgentLogger().getRecentLogs(count),
      memory,
      tags,
      alarms: features.alarms ? alarmStore : undefined,
      lorebook: features.lorebook ? lorebook : undefined,
      periodic,
      extraStatus: () => ({
        foreground: loop.getStatus(),
        retrospect: retrospect.getStats(),
        hangout: hangout.getStatus(),
      }),
    });
    web = startWebServer(app, settings.web.port);
  }

  log.info(`${characterName()} is ready`, {
    memory: memory.mode,
    streaming: settings.llm.streamChats,
    web: settings.web.enabled ? settings.web.port : false,
  });

  let stopping: Promise<void> | null = null;

  async function stopAll(): Promise<void> {
    loop.stop();
    if (web) {
      try {
        await web.close();
      } catch (err) {
        log.warn("Web server did not close cleanly", { error: errorMessage(err) });
      }
    }
    periodic.stop();
    conversation.stopGeneration();
    await dispatcher.stop();
    if (db) closeDatabase(db);
    log.info("Companion stopped");
    await getAgentLogger().flush();
  }

  return {
    settings,
    run: async () => {
      terminal.start();
      await loop.run();
    },
    shutdown: () => {
      stopping ??= stopAll();
      return stopping;
    },
  };
}
