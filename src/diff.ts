import type { CursorStore } from "./store.js";
import type { PostRecord, ThreadRecord } from "./types.js";

export type CursorReader = Pick<CursorStore, "getForumCursor" | "getLastPostId">;

/**
 * Threads in `allThreads` whose ID is not in the forum's seen set, in listing order.
 * With no stored cursor every thread counts as new.
 */
export function getNewThreads(store: CursorReader, forumId: string, allThreads: ThreadRecord[]): ThreadRecord[] {
  const seen = new Set(store.getForumCursor(forumId)?.seenThreadIds ?? []);
  const fresh = allThreads.filter((thread) => !seen.has(thread.id));

  if (fresh.length > 0) {
    console.log(`[DIFF] ${fresh.length} new thread(s) in forum ${forumId}`);
  } else {
    console.log(`[DIFF] No new threads in forum ${forumId}`);
  }
  return fresh;
}

/**
 * Posts after the stored last post ID, in posting order.
 *
 * Without a stored ID only the latest post is returned, so the first run sets
 * a baseline instead of replaying the whole thread. When the stored ID is no
 * longer on the page the thread is re-baselined the same way.
 */
export function getNewPosts(store: CursorReader, threadId: string, allPosts: PostRecord[]): PostRecord[] {
  const latest = allPosts.at(-1);
  if (!latest) return [];

  const lastPostId = store.getLastPostId(threadId);
  if (lastPostId === undefined) {
    console.log(`[DIFF] First check of thread ${threadId}, baselining on ${latest.id}`);
    return [latest];
  }

  const index = allPosts.findIndex((post) => post.id === lastPostId);
  if (index === -1) {
    console.warn(
      `[DIFF] Last seen post ${lastPostId} not found in thread ${threadId}; re-baselining on ${latest.id}`
    );
    return [latest];
  }

  const fresh = allPosts.slice(index + 1);
  if (fresh.length > 0) {
    console.log(`[DIFF] ${fresh.length} new post(s) in thread ${threadId}`);
  } else {
    console.log(`[DIFF] No new posts in thread ${threadId}`);
  }
  return fresh;
}
