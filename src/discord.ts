import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import { NotifyError, errorMessage } from "./errors.js";
import type { Notifier, PostRecord, ThreadRecord } from "./types.js";
import { type Sleep, sleep, truncate } from "./utils.js";

export const EMBED_COLORS = {
  reply: 0x5865f2,
  thread: 0x57f287,
  error: 0xed4245,
} as const;

const FOOTER = { text: "Forum Monitor" };
const PREVIEW_LENGTH = 200;
const DESCRIPTION_LIMIT = 4000;

// Discord allows 5 webhook calls per 2 seconds
const BATCH_SIZE = 4;
const BATCH_PAUSE_MS = 2000;
const DEFAULT_RETRY_AFTER_S = 5;

export interface EmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface DiscordEmbed {
  title: string;
  description?: string;
  color: number;
  url?: string;
  fields?: EmbedField[];
  footer: { text: string };
}

export function formatThreadEmbed(thread: ThreadRecord, forumName: string): DiscordEmbed {
  const fields: EmbedField[] = [{ name: "Author", value: thread.author || "Unknown", inline: true }];
  if (thread.lastPostDate) {
    fields.push({ name: "Posted", value: thread.lastPostDate, inline: true });
  }
  return {
    title: `🆕 New Thread in ${forumName}`,
    description: `**${thread.title || "Untitled"}**`,
    color: EMBED_COLORS.thread,
    url: thread.url,
    fields,
    footer: FOOTER,
  };
}

export function formatPostEmbed(post: PostRecord, threadName: string): DiscordEmbed {
  const preview = truncate(post.content, PREVIEW_LENGTH);
  const fields: EmbedField[] = [{ name: "Author", value: post.author || "Unknown", inline: true }];
  if (post.timestamp) {
    fields.push({ name: "Posted", value: post.timestamp, inline: true });
  }
  return {
    title: `New Reply in ${threadName}`,
    description: preview || "*No content preview available*",
    color: EMBED_COLORS.reply,
    url: post.url,
    fields,
    footer: FOOTER,
  };
}

export function formatErrorEmbed(message: string, contextName: string): DiscordEmbed {
  return {
    title: `⚠️ Monitor Error - ${contextName}`,
    description: truncate(message, DESCRIPTION_LIMIT),
    color: EMBED_COLORS.error,
    footer: FOOTER,
  };
}

function retryAfterSeconds(res: AxiosResponse<unknown>): number {
  const body = res.data;
  if (body && typeof body === "object" && "retry_after" in body && typeof body.retry_after === "number") {
    return body.retry_after;
  }
  const header: unknown = res.headers["retry-after"];
  if (typeof header === "string" || typeof header === "number") {
    const seconds = Number(header);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds;
  }
  return DEFAULT_RETRY_AFTER_S;
}

export interface DiscordNotifierOptions {
  adapter?: AxiosAdapter;
  sleep?: Sleep;
  timeoutMs?: number;
}

export class DiscordNotifier implements Notifier {
  private readonly http: AxiosInstance;
  private readonly sleep: Sleep;

  constructor(private readonly webhookUrl: string, options: DiscordNotifierOptions = {}) {
    this.http = axios.create({
      timeout: options.timeoutMs ?? 10000,
      adapter: options.adapter,
      // Status codes are inspected by hand so a 429 can be retried
      validateStatus: () => true,
    });
    this.sleep = options.sleep ?? sleep;
  }

  notifyNewThread(thread: ThreadRecord, forumName: string): Promise<boolean> {
    return this.sendEmbed(formatThreadEmbed(thread, forumName), `new thread ${thread.id}`);
  }

  notifyNewPost(post: PostRecord, threadName: string): Promise<boolean> {
    return this.sendEmbed(formatPostEmbed(post, threadName), `post ${post.id}`);
  }

  notifyError(message: string, contextName: string): Promise<boolean> {
    return this.sendEmbed(formatErrorEmbed(message, contextName), "error notification", false);
  }

  notifyNewThreads(threads: ThreadRecord[], forumName: string): Promise<number> {
    return this.sendBatch(threads, (thread) => this.notifyNewThread(thread, forumName));
  }

  notifyNewPosts(posts: PostRecord[], threadName: string): Promise<number> {
    return this.sendBatch(posts, (post) => this.notifyNewPost(post, threadName));
  }

  testWebhook(): Promise<boolean> {
    return this.sendEmbed(
      {
        title: "✅ Forum Monitor Test",
        description: "Webhook connection successful!",
        color: EMBED_COLORS.thread,
        footer: FOOTER,
      },
      "test message"
    );
  }

  private async sendBatch<T>(items: T[], send: (item: T) => Promise<boolean>): Promise<number> {
    if (items.length === 0) return 0;

    let sent = 0;
    for (const [i, item] of items.entries()) {
      if (await send(item)) sent++;

      if ((i + 1) % BATCH_SIZE === 0 && i + 1 < items.length) {
        console.log(`[DISCORD] Sent ${i + 1}/${items.length}, pausing for rate limits`);
        await this.sleep(BATCH_PAUSE_MS);
      }
    }

    console.log(`[DISCORD] Sent ${sent}/${items.length} notification(s)`);
    return sent;
  }

  private post(embed: DiscordEmbed): Promise<AxiosResponse<unknown>> {
    return this.http.post<unknown>(this.webhookUrl, { embeds: [embed] });
  }

  private async sendEmbed(embed: DiscordEmbed, label: string, retryOnRateLimit = true): Promise<boolean> {
    try {
      let res = await this.post(embed);

      if (res.status === 429 && retryOnRateLimit) {
        const wait = retryAfterSeconds(res);
        console.warn(`[DISCORD] Rate limited, retrying ${label} in ${wait}s`);
        await this.sleep(wait * 1000);
        res = await this.post(embed);
      }

      if (res.status < 200 || res.status >= 300) {
        throw new NotifyError(`webhook answered ${res.status}`, res.status);
      }

      console.log(`[DISCORD] Sent ${label}`);
      return true;
    } catch (err) {
      console.error(`[DISCORD] Failed to send ${label}: ${errorMessage(err)}`);
      return false;
    }
  }
}
