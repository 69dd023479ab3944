export interface ThreadRecord {
  id: string; // e.g. "t31", taken from the thread URL
  title: string;
  author: string;
  url: string;
  lastPostDate: string; // as displayed by the forum, may be ""
}

export interface PostRecord {
  id: string; // e.g. "p1042", increases in posting order
  author: string;
  content: string; // preview, possibly truncated
  timestamp: string;
  url: string;
}

export interface ForumCursor {
  kind: "forum";
  seenThreadIds: string[];
  lastCheckedAt: string; // ISO
  totalThreads: number;
}

export interface ThreadCursor {
  kind: "thread";
  lastPostId?: string;
  lastCheckedAt: string; // ISO
  totalPostsSeen: number;
}

export type Cursor = ForumCursor | ThreadCursor;

export type MonitorType = Cursor["kind"];

export interface ForumMonitor {
  type: "forum";
  id: string;
  name: string;
  forumUrl: string;
  sectionUrl: string;
  webhookEnv: string;
}

export interface ThreadMonitor {
  type: "thread";
  id: string;
  name: string;
  forumUrl: string;
  threadUrl: string;
  webhookEnv: string;
}

export type Monitor = ForumMonitor | ThreadMonitor;

export interface ForumSource {
  authenticate(): Promise<boolean>;
  fetchSectionThreads(sectionUrl: string): Promise<ThreadRecord[]>;
  fetchThreadPosts(threadUrl: string): Promise<PostRecord[]>;
}

export interface Notifier {
  notifyNewThread(thread: ThreadRecord, contextName: string): Promise<boolean>;
  notifyNewPost(post: PostRecord, contextName: string): Promise<boolean>;
  notifyError(message: string, contextName: string): Promise<boolean>;
  notifyNewThreads(threads: ThreadRecord[], contextName: string): Promise<number>;
  notifyNewPosts(posts: PostRecord[], contextName: string): Promise<number>;
}

export type MonitorOutcome =
  | { monitorId: string; status: "ok"; sent: number; newItems: number }
  | { monitorId: string; status: "skipped"; sent: 0; reason: string }
  | { monitorId: string; status: "failed"; sent: 0; reason: string };

export interface RunSummary {
  totalNotifications: number;
  outcomes: MonitorOutcome[];
  stateSaved: boolean;
}
