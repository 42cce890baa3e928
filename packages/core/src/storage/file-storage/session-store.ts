import { readFile, writeFile, mkdir, readdir, rename, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { EngineError, SessionAlreadyExistsError, TransientError } from "../../errors/index.js";
import { KeyedLock } from "../../session/keyed-lock.js";
import { describeSessionKey } from "../../session/types.js";
import type { JsonValue, Session, SessionKey, SessionSummary } from "../../session/types.js";
import type { SessionStore } from "../interfaces.js";
import { appendTurn, missingSession, newSession, summarize } from "../session-helpers.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const observationErrorSchema = z.object({ code: z.string(), message: z.string() });

const sessionFileSchema = z.object({
  key: z.object({ appName: z.string(), userId: z.string(), sessionId: z.string() }),
  state: z.record(jsonValueSchema),
  history: z.array(z.object({
    seq: z.number().int(),
    actor: z.string(),
    timestamp: z.string(),
    payload: z.discriminatedUnion("type", [
      z.object({ type: z.literal("text"), text: z.string() }),
      z.object({ type: z.literal("tool-call"), callId: z.string(), toolName: z.string(), args: z.record(z.unknown()) }),
      z.object({ type: z.literal("tool-result"), callId: z.string(), toolName: z.string(), result: z.unknown().optional(), error: observationErrorSchema.optional() }),
      z.object({ type: z.literal("delegation"), callId: z.string(), target: z.string(), error: observationErrorSchema.optional() }),
      z.object({ type: z.literal("agent-result"), callId: z.string(), agent: z.string(), text: z.string() }),
    ]),
  })),
  createdAt: z.string(),
  updatedAt: z.string(),
});

/** Keeps ids usable as path segments */
function segment(value: string): string {
  return encodeURIComponent(value);
}

export function createSessionStore(dataDir: string): SessionStore {
  const baseDir = join(dataDir, "sessions");
  const locks = new KeyedLock();

  function userDir(appName: string, userId: string): string {
    return join(baseDir, segment(appName), segment(userId));
  }

  function filePath(key: SessionKey): string {
    return join(userDir(key.appName, key.userId), `${segment(key.sessionId)}.json`);
  }

  async function io<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof EngineError) throw err;
      throw new TransientError(`Session storage failed to ${action}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }

  async function readSession(key: SessionKey): Promise<Session | null> {
    const path = filePath(key);
    if (!existsSync(path)) return null;
    const raw = await readFile(path, "utf-8");
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err: unknown) {
      console.warn(`[file-storage] Ignoring unreadable session file ${path}:`, err instanceof Error ? err.message : err);
      return null;
    }
    const parsed = sessionFileSchema.safeParse(data);
    if (!parsed.success) {
      console.warn(`[file-storage] Ignoring malformed session file ${path}`);
      return null;
    }
    return parsed.data;
  }

  async function writeSession(session: Session): Promise<void> {
    await mkdir(userDir(session.key.appName, session.key.userId), { recursive: true });
    await writeFile(filePath(session.key), JSON.stringify(session, null, 2));
  }

  async function requireSession(key: SessionKey): Promise<Session> {
    const session = await readSession(key);
    if (!session) throw missingSession(key);
    return session;
  }

  return {
    get(key) {
      return io("read session", () => readSession(key));
    },

    create(key, initialState) {
      return locks.run(filePath(key), () => io("create session", async () => {
        const path = filePath(key);
        if (existsSync(path)) {
          if (await readSession(key)) throw new SessionAlreadyExistsError(describeSessionKey(key));
          // Unreadable files count as absent, so one must not block the session
          const aside = `${path}.corrupt-${Date.now()}`;
          await rename(path, aside);
          console.warn(`[file-storage] Moved unreadable session file ${path} to ${aside}`);
        }
        const session = newSession(key, initialState);
        await writeSession(session);
        return session;
      }));
    },

    append(key, turn) {
      return locks.run(filePath(key), () => io("append turn", async () => {
        const session = await requireSession(key);
        const entry = appendTurn(session, turn);
        await writeSession(session);
        return entry;
      }));
    },

    mutateState(key, patch) {
      return locks.run(filePath(key), () => io("update state", async () => {
        const session = await requireSession(key);
        session.state = patch(session.state);
        session.updatedAt = new Date().toISOString();
        await writeSession(session);
        return session.state;
      }));
    },

    list(appName, userId) {
      return io("list sessions", async () => {
        const dir = userDir(appName, userId);
        if (!existsSync(dir)) return [];
        const entries = await readdir(dir, { withFileTypes: true });
        const summaries: SessionSummary[] = [];
        for (const entry of entries) {
          if (!entry.isFile() || !entry.name.endsWith(".json")) continue;
          const sessionId = decodeURIComponent(entry.name.slice(0, -".json".length));
          const session = await readSession({ appName, userId, sessionId });
          if (session) summaries.push(summarize(session));
        }
        return summaries;
      });
    },

    delete(key) {
      return locks.run(filePath(key), () => io("delete session", async () => {
        const path = filePath(key);
        if (!existsSync(path)) return false;
        await unlink(path);
        return true;
      }));
    },
  };
}
