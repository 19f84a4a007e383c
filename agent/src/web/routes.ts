/**
 * Web Control Surface Routes
 *
 * JSON API for a browser dashboard: status, chat, generation control,
 * alarms, tags, lorebook and recent logs. Subsystems that are switched off
 * answer 503.
 */

import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import type { LogEntry } from "@companion/shared/logging";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { isRecord, isStringArray, numberField, stringArrayField, stringField } from "../core/validate.js";
import type { AlarmStore } from "../alarms/store.js";
import type { ResponseController } from "../conversation/response-controller.js";
import type { Lorebook } from "../lorebook/lorebook.js";
import type { MemoryStore } from "../memory/memory-store.js";
import type { PeriodicManager } from "../periodic/manager.js";
import type { PipeDispatcher } from "../pipes/dispatcher.js";
import type { TagController } from "../tags/tag-controller.js";

const log = createComponentLogger("web");

const DEFAULT_LOG_COUNT = 100;
const MAX_LOG_COUNT = 1000;

export interface WebDeps {
  dispatcher: Pick<PipeDispatcher, "getStatus">;
  conversation: Pick<
    ResponseController,
    "sendMessage" | "regenerateLast" | "stopGeneration" | "getHistory" | "getStats" | "lastMessageStreamed"
  >;
  speak: (text: string) => Promise<void>;
  logs: (count: number) => LogEntry[];
  memory?: Pick<MemoryStore, "getStats">;
  tags?: Pick<TagController, "getActiveTags" | "add" | "remove" | "clear" | "stats" | "ruleNames">;
  alarms?: Pick<AlarmStore, "list" | "add" | "remove" | "toggle">;
  lorebook?: Pick<Lorebook, "list" | "search" | "add" | "remove" | "stats">;
  periodic?: Pick<PeriodicManager, "getStatus">;
  /** Extra status sections, e.g. retrospect or hangout */
  extraStatus?: () => Record<string, unknown>;
}

async function readBody(c: Context): Promise<Record<string, unknown>> {
  const body: unknown = await c.req.json().catch(() => null);
  return isRecord(body) ? body : {};
}

function disabled(c: Context, subsystem: string): Response {
  return c.json({ error: `${subsystem} disabled` }, 503);
}

// ============================================
// STATUS / CONVERSATION
// ============================================

function registerConversationRoutes(app: Hono, deps: WebDeps): void {
  app.get("/api/status", (c) => {
    return c.json({
      dispatcher: deps.dispatcher.getStatus(),
      conversation: deps.conversation.getStats(),
      memory: deps.memory?.getStats() ?? null,
      tags: deps.tags ? { active: deps.tags.getActiveTags(), ...deps.tags.stats() } : null,
      periodic: deps.periodic?.getStatus() ?? null,
      ...deps.extraStatus?.(),
    });
  });

  app.get("/api/history", (c) => {
    return c.json({ history: deps.conversation.getHistory() });
  });

  // Speaks the reply unless it streamed
  app.post("/api/chat", async (c) => {
    const body = await readBody(c);
    const message = stringField(body, "message").trim();
    if (!message) return c.json({ error: "message is required" }, 400);

    const reply = await deps.conversation.sendMessage(message, { platform: "web" });
    const streamed = deps.conversation.lastMessageStreamed;
    if (!streamed) await deps.speak(reply);
    return c.json({ reply, streamed });
  });

  app.post("/api/next", async (c) => {
    const reply = await deps.conversation.regenerateLast({ platform: "web" });
    if (reply === null) return c.json({ error: "Nothing to regenerate" }, 409);
    const streamed = deps.conversation.lastMessageStreamed;
    if (!streamed) await deps.speak(reply);
    return c.json({ reply, streamed });
  });

  app.post("/api/stop", (c) => {
    deps.conversation.stopGeneration();
    return c.json({ stopped: true });
  });

  app.get("/api/logs", (c) => {
    const requested = Number(c.req.query("count") ?? DEFAULT_LOG_COUNT);
    const count = Number.isInteger(requested) && requested > 0 ? Math.min(requested, MAX_LOG_COUNT) : DEFAULT_LOG_COUNT;
    return c.json({ logs: deps.logs(count) });
  });
}

// ============================================
// ALARMS
// ============================================

function registerAlarmRoutes(app: Hono, deps: WebDeps): void {
  app.get("/api/alarms", (c) => {
    if (!deps.alarms) return disabled(c, "Alarms are");
    return c.json({ alarms: deps.alarms.list() });
  });

  app.post("/api/alarms", async (c) => {
    if (!deps.alarms) return disabled(c, "Alarms are");
    const body = await readBody(c);
    const result = await deps.alarms.add({
      name: stringField(body, "name"),
      time: stringField(body, "time"),
      message: stringField(body, "message"),
      recurring: body.recurring === true,
    });
    if (!result.ok) return c.json({ error: result.error }, 400);
    return c.json({ alarm: result.alarm }, 201);
  });

  app.delete("/api/alarms/:name", async (c) => {
    if (!deps.alarms) return disabled(c, "Alarms are");
    const name = c.req.param("name");
    const removed = await deps.alarms.remove(name);
    if (!removed) return c.json({ error: `Alarm "${name}" not found` }, 404);
    return c.json({ name, removed });
  });

  app.patch("/api/alarms/:name/toggle", async (c) => {
    if (!deps.alarms) return disabled(c, "Alarms are");
    const name = c.req.param("name");
    const enabled = await deps.alarms.toggle(name);
    if (enabled === null) return c.json({ error: `Alarm "${name}" not found` }, 404);
    return c.json({ name, enabled });
  });
}

// ============================================
// TAGS
// ============================================

function registerTagRoutes(app: Hono, deps: WebDeps): void {
  app.get("/api/tags", (c) => {
    if (!deps.tags) return disabled(c, "Tags are");
    return c.json({ active: deps.tags.getActiveTags(), available: deps.tags.ruleNames(), stats: deps.tags.stats() });
  });

  app.post("/api/tags", async (c) => {
    if (!deps.tags) return disabled(c, "Tags are");
    const body = await readBody(c);
    if (!isStringArray(body.tags) || body.tags.length === 0) {
      return c.json({ error: "tags must be a non-empty string array" }, 400);
    }
    const added = await deps.tags.add(body.tags, "manual");
    return c.json({ added, active: deps.tags.getActiveTags() });
  });

  // Without a tags list, clears every active tag
  app.delete("/api/tags", async (c) => {
    if (!deps.tags) return disabled(c, "Tags are");
    const body = await readBody(c);
    const tags = stringArrayField(body, "tags");
    const removed = tags.length > 0 ? await deps.tags.remove(tags, "manual") : await deps.tags.clear();
    return c.json({ removed, active: deps.tags.getActiveTags() });
  });
}

// ============================================
// LOREBOOK
// ============================================

function registerLorebookRoutes(app: Hono, deps: WebDeps): void {
  app.get("/api/lorebook", (c) => {
    if (!deps.lorebook) return disabled(c, "Lorebook is");
    const query = c.req.query("q")?.trim();
    const entries = query ? deps.lorebook.search(query) : deps.lorebook.list();
    return c.json({ entries, stats: deps.lorebook.stats() });
  });

  app.post("/api/lorebook", async (c) => {
    if (!deps.lorebook) return disabled(c, "Lorebook is");
    const body = await readBody(c);
    const title = stringField(body, "title").trim();
    const content = stringField(body, "content").trim();
    const keywords = stringArrayField(body, "keywords");
    if (!title || !content || keywords.length === 0) {
      return c.json({ error: "title, content and keywords are required" }, 400);
    }
    const entry = await deps.lorebook.add({ title, content, keywords, priority: numberField(body, "priority", 1) });
    return c.json({ entry }, 201);
  });

  app.delete("/api/lorebook/:id", async (c) => {
    if (!deps.lorebook) return disabled(c, "Lorebook is");
    const id = c.req.param("id");
    const removed = await deps.lorebook.remove(id);
    if (!removed) return c.json({ error: `Entry "${id}" not found` }, 404);
    return c.json({ id, removed });
  });
}

// ============================================
// APP
// ============================================

export function createWebApp(deps: WebDeps): Hono {
  const app = new Hono();
  app.use("*", cors());

  registerConversationRoutes(app, deps);
  registerAlarmRoutes(app, deps);
  registerTagRoutes(app, deps);
  registerLorebookRoutes(app, deps);

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError((err, c) => {
    log.error(`Request failed: ${c.req.method} ${c.req.path}`, err);
    return c.json({ error: errorMessage(err) }, 500);
  });

  return app;
}
