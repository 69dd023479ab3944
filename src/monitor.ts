import { type MonitorDescriptor, describeMonitor, isEnabled, resolveMonitor, resolveWebhookUrl } from "./config.js";
import { getNewPosts, getNewThreads } from "./diff.js";
import { AuthenticationError, errorMessage, isAuthenticationError } from "./errors.js";
import type { CursorStore } from "./store.js";
import type {
  ForumMonitor,
  ForumSource,
  Monitor,
  MonitorOutcome,
  Notifier,
  RunSummary,
  ThreadMonitor,
} from "./types.js";

export interface MonitorDeps {
  store: CursorStore;
  createClient: (monitor: Monitor) => ForumSource;
  createNotifier: (webhookUrl: string) => Notifier;
  env?: NodeJS.ProcessEnv;
}

/**
 * Sends an error embed if a notifier is available. Never throws, so a failure
 * to report cannot hide the failure being reported.
 */
export async function reportFailure(notifier: Notifier | null, message: string, contextName: string): Promise<void> {
  if (!notifier) return;
  try {
    const delivered = await notifier.notifyError(message, contextName);
    if (!delivered) console.warn(`[MONITOR] Error notification for ${contextName} was not delivered`);
  } catch (err) {
    console.warn(`[MONITOR] Could not send error notification for ${contextName}: ${errorMessage(err)}`);
  }
}

// Empty results keep the stored cursor and send no error embed
function emptyFetch(monitor: Monitor, reason: string): MonitorOutcome {
  console.warn(`[MONITOR] ${reason}; keeping the stored cursor`);
  return { monitorId: monitor.id, status: "skipped", sent: 0, reason };
}

async function runForumMonitor(
  monitor: ForumMonitor,
  client: ForumSource,
  notifier: Notifier,
  store: CursorStore
): Promise<MonitorOutcome> {
  console.log(`[MONITOR] Fetching threads from ${monitor.sectionUrl}`);
  const threads = await client.fetchSectionThreads(monitor.sectionUrl);
  if (threads.length === 0) {
    return emptyFetch(monitor, `No threads found in forum section ${monitor.sectionUrl}`);
  }

  const fresh = getNewThreads(store, monitor.id, threads);

  let sent = 0;
  try {
    if (fresh.length > 0) {
      console.log(`[MONITOR] Sending ${fresh.length} notification(s)`);
      sent = await notifier.notifyNewThreads(fresh, monitor.name);
    }
  } finally {
    // Committed whatever the notifier did: a dropped alert beats a repeated one
    store.updateForumState(monitor.id, threads.map((t) => t.id));
  }

  return { monitorId: monitor.id, status: "ok", sent, newItems: fresh.length };
}

async function runThreadMonitor(
  monitor: ThreadMonitor,
  client: ForumSource,
  notifier: Notifier,
  store: CursorStore
): Promise<MonitorOutcome> {
  console.log(`[MONITOR] Fetching posts from ${monitor.threadUrl}`);
  const posts = await client.fetchThreadPosts(monitor.threadUrl);
  const latest = posts.at(-1);
  if (!latest) {
    return emptyFetch(monitor, `No posts found in thread ${monitor.threadUrl}`);
  }

  const fresh = getNewPosts(store, monitor.id, posts);

  let sent = 0;
  try {
    if (fresh.length > 0) {
      console.log(`[MONITOR] Sending ${fresh.length} notification(s)`);
      sent = await notifier.notifyNewPosts(fresh, monitor.name);
    }
  } finally {
    store.updateThreadState(monitor.id, latest.id, posts.length);
  }

  return { monitorId: monitor.id, status: "ok", sent, newItems: fresh.length };
}

export async function processMonitor(descriptor: MonitorDescriptor, deps: MonitorDeps): Promise<MonitorOutcome> {
  let monitor: Monitor;
  let webhookUrl: string;
  try {
    monitor = resolveMonitor(descriptor);
    webhookUrl = resolveWebhookUrl(monitor, deps.env);
  } catch (err) {
    const reason = errorMessage(err);
    console.error(`[MONITOR] Skipping ${describeMonitor(descriptor)}: ${reason}`);
    return { monitorId: describeMonitor(descriptor), status: "skipped", sent: 0, reason };
  }

  console.log(`\n--- Processing: ${monitor.name} (ID: ${monitor.id}, Type: ${monitor.type}) ---`);

  let notifier: Notifier | null = null;
  try {
    notifier = deps.createNotifier(webhookUrl);
    const client = deps.createClient(monitor);

    console.log(`[MONITOR] Authenticating to ${monitor.forumUrl}`);
    if (!(await client.authenticate())) {
      throw new AuthenticationError(`Failed to authenticate to forum: ${monitor.forumUrl}`);
    }

    return monitor.type === "forum"
      ? await runForumMonitor(monitor, client, notifier, deps.store)
      : await runThreadMonitor(monitor, client, notifier, deps.store);
  } catch (err) {
    const reason = isAuthenticationError(err)
      ? err.message
      : `Error processing monitor ${monitor.id}: ${errorMessage(err)}`;
    console.error(`[MONITOR] ${reason}`);
    await reportFailure(notifier, reason, monitor.name);
    return { monitorId: monitor.id, status: "failed", sent: 0, reason };
  }
}

/**
 * One pass over every enabled monitor, strictly one after another. The cursor
 * file is read at the start and written once at the end.
 */
export async function runMonitorOnce(descriptors: MonitorDescriptor[], deps: MonitorDeps): Promise<RunSummary> {
  deps.store.load();

  const enabled = descriptors.filter(isEnabled);
  console.log(`[MONITOR] Processing ${enabled.length} enabled monitor(s)`);

  const outcomes: MonitorOutcome[] = [];
  for (const descriptor of enabled) {
    outcomes.push(await processMonitor(descriptor, deps));
  }

  const stateSaved = deps.store.save();
  const totalNotifications = outcomes.reduce((sum, o) => sum + o.sent, 0);
  const failed = outcomes.filter((o) => o.status !== "ok").length;

  console.log(
    `[MONITOR] Run complete: ${totalNotifications} notification(s) sent, ${failed} monitor(s) skipped or failed`
  );
  return { totalNotifications, outcomes, stateSaved };
}
