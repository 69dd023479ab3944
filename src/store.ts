import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { PersistenceError, errorMessage, toError } from "./errors.js";
import type { Cursor, ForumCursor, ThreadCursor } from "./types.js";

const forumEntrySchema = z.object({
  kind: z.literal("forum"),
  seen_thread_ids: z.array(z.string()),
  last_checked_at: z.string(),
  total_threads: z.number().int().nonnegative(),
});

const threadEntrySchema = z.object({
  kind: z.literal("thread"),
  last_post_id: z.string().nullish(),
  last_checked_at: z.string(),
  total_posts_seen: z.number().int().nonnegative(),
});

type PersistedEntry = z.infer<typeof forumEntrySchema> | z.infer<typeof threadEntrySchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Files written before entries were tagged carry no "kind"; infer it from the fields.
function withInferredKind(value: unknown): unknown {
  if (!isRecord(value) || "kind" in value) return value;
  if (Array.isArray(value.seen_thread_ids)) return { ...value, kind: "forum" };
  if ("last_post_id" in value || "total_posts_seen" in value) return { ...value, kind: "thread" };
  return value;
}

const entrySchema = z.preprocess(
  withInferredKind,
  z.discriminatedUnion("kind", [forumEntrySchema, threadEntrySchema])
);

function fromPersisted(entry: PersistedEntry): Cursor {
  if (entry.kind === "forum") {
    return {
      kind: "forum",
      seenThreadIds: entry.seen_thread_ids,
      lastCheckedAt: entry.last_checked_at,
      totalThreads: entry.total_threads,
    };
  }
  const cursor: ThreadCursor = {
    kind: "thread",
    lastCheckedAt: entry.last_checked_at,
    totalPostsSeen: entry.total_posts_seen,
  };
  if (entry.last_post_id != null) cursor.lastPostId = entry.last_post_id;
  return cursor;
}

function toPersisted(cursor: Cursor): PersistedEntry {
  if (cursor.kind === "forum") {
    return {
      kind: "forum",
      seen_thread_ids: cursor.seenThreadIds,
      last_checked_at: cursor.lastCheckedAt,
      total_threads: cursor.totalThreads,
    };
  }
  return {
    kind: "thread",
    last_post_id: cursor.lastPostId ?? null,
    last_checked_at: cursor.lastCheckedAt,
    total_posts_seen: cursor.totalPostsSeen,
  };
}

export interface CursorSummary {
  monitorId: string;
  kind: Cursor["kind"];
  lastCheckedAt: string;
  lastPostId?: string;
  tracked: number;
}

export interface CursorStoreOptions {
  now?: () => Date;
}

/**
 * Persisted "already notified" markers, one per monitor.
 *
 * Loaded once per run, mutated in memory while monitors are processed and
 * written back as a whole with {@link CursorStore.save}. Concurrent writers
 * are not coordinated.
 */
export class CursorStore {
  readonly filePath: string;
  lastSaveError: PersistenceError | null = null;

  private cursors = new Map<string, Cursor>();
  private readonly now: () => Date;

  constructor(filePath: string, options: CursorStoreOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.now = options.now ?? (() => new Date());
  }

  load(): ReadonlyMap<string, Cursor> {
    this.cursors = new Map();

    if (!fs.existsSync(this.filePath)) {
      console.log(`[STATE] No state file at ${this.filePath}, starting fresh`);
      return this.cursors;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    } catch (err) {
      console.warn(`[STATE] Could not read ${this.filePath} (${errorMessage(err)}), starting with empty state`);
      return this.cursors;
    }

    if (!isRecord(raw)) {
      console.warn(`[STATE] ${this.filePath} does not hold a JSON object, starting with empty state`);
      return this.cursors;
    }

    for (const [monitorId, value] of Object.entries(raw)) {
      const parsed = entrySchema.safeParse(value);
      if (!parsed.success) {
        console.warn(`[STATE] Dropping unreadable entry "${monitorId}"`);
        continue;
      }
      this.cursors.set(monitorId, fromPersisted(parsed.data));
    }

    console.log(`[STATE] Loaded ${this.cursors.size} cursor(s)`);
    return this.cursors;
  }

  save(): boolean {
    const doc: Record<string, PersistedEntry> = {};
    for (const [monitorId, cursor] of this.cursors) {
      doc[monitorId] = toPersisted(cursor);
    }

    const tmpPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, JSON.stringify(doc, null, 2), "utf8");
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      this.lastSaveError = new PersistenceError(
        `Could not write state file: ${errorMessage(err)}`,
        this.filePath,
        toError(err)
      );
      console.error(`[STATE] ${this.lastSaveError.message}`);
      return false;
    }

    this.lastSaveError = null;
    console.log(`[STATE] Saved ${this.cursors.size} cursor(s) to ${this.filePath}`);
    return true;
  }

  get(monitorId: string): Cursor | undefined {
    return this.cursors.get(monitorId);
  }

  getForumCursor(monitorId: string): ForumCursor | undefined {
    const cursor = this.cursors.get(monitorId);
    return cursor?.kind === "forum" ? cursor : undefined;
  }

  getThreadCursor(monitorId: string): ThreadCursor | undefined {
    const cursor = this.cursors.get(monitorId);
    return cursor?.kind === "thread" ? cursor : undefined;
  }

  getLastPostId(monitorId: string): string | undefined {
    return this.getThreadCursor(monitorId)?.lastPostId;
  }

  updateThreadState(monitorId: string, lastPostId: string, totalPosts: number): void {
    this.cursors.set(monitorId, {
      kind: "thread",
      lastPostId,
      lastCheckedAt: this.now().toISOString(),
      totalPostsSeen: totalPosts,
    });
    console.log(`[STATE] Thread ${monitorId}: last post ${lastPostId}, ${totalPosts} seen`);
  }

  // Replaces the seen set with this fetch's IDs; threads that dropped off the listing are forgotten.
  updateForumState(monitorId: string, threadIds: string[]): void {
    const seenThreadIds = [...new Set(threadIds)];
    this.cursors.set(monitorId, {
      kind: "forum",
      seenThreadIds,
      lastCheckedAt: this.now().toISOString(),
      totalThreads: seenThreadIds.length,
    });
    console.log(`[STATE] Forum ${monitorId}: ${seenThreadIds.length} thread(s) tracked`);
  }

  summary(): CursorSummary[] {
    return [...this.cursors].map(([monitorId, cursor]) =>
      cursor.kind === "forum"
        ? { monitorId, kind: cursor.kind, lastCheckedAt: cursor.lastCheckedAt, tracked: cursor.totalThreads }
        : {
            monitorId,
            kind: cursor.kind,
            lastCheckedAt: cursor.lastCheckedAt,
            lastPostId: cursor.lastPostId,
            tracked: cursor.totalPostsSeen,
          }
    );
  }
}
