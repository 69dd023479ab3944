import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig, RawAxiosResponseHeaders } from "axios";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { DiscordNotifier, EMBED_COLORS, formatErrorEmbed, formatPostEmbed, formatThreadEmbed } from "./discord.js";
import type { PostRecord, ThreadRecord } from "./types.js";

const WEBHOOK = "https://discord.test/api/webhooks/1/test-token";

function reply(
  config: InternalAxiosRequestConfig,
  status: number,
  data: unknown = "",
  headers: RawAxiosResponseHeaders = {}
): AxiosResponse {
  return { data, status, statusText: String(status), headers, config };
}

// Answers each call with the next status in the list, repeating the last one
function scripted(...statuses: (number | { status: number; data?: unknown; headers?: RawAxiosResponseHeaders })[]) {
  const bodies: unknown[] = [];
  let call = 0;
  const adapter: AxiosAdapter = async (config) => {
    bodies.push(JSON.parse(String(config.data)));
    const next = statuses[Math.min(call++, statuses.length - 1)];
    return typeof next === "number" ? reply(config, next) : reply(config, next.status, next.data, next.headers);
  };
  return { adapter, bodies, calls: () => call };
}

const thread = (id: string): ThreadRecord => ({
  id,
  title: `Topic ${id}`,
  author: "alice",
  url: `https://forum.test/${id}-topic`,
  lastPostDate: "Mar 12, 2024",
});

const post = (id: string, content = "Hello there"): PostRecord => ({
  id,
  author: "bob",
  content,
  timestamp: "Today at 10:00",
  url: `https://forum.test/t1-topic#${id}`,
});

describe("embed formatting", () => {
  it("formats a new thread", () => {
    expect(formatThreadEmbed(thread("t7"), "Announcements")).toEqual({
      title: "🆕 New Thread in Announcements",
      description: "**Topic t7**",
      color: EMBED_COLORS.thread,
      url: "https://forum.test/t7-topic",
      fields: [
        { name: "Author", value: "alice", inline: true },
        { name: "Posted", value: "Mar 12, 2024", inline: true },
      ],
      footer: { text: "Forum Monitor" },
    });
  });

  it("leaves out the date field and fills blanks for sparse threads", () => {
    const embed = formatThreadEmbed({ ...thread("t7"), title: "", author: "", lastPostDate: "" }, "Announcements");
    expect(embed.description).toBe("**Untitled**");
    expect(embed.fields).toEqual([{ name: "Author", value: "Unknown", inline: true }]);
  });

  it("truncates long post previews", () => {
    const embed = formatPostEmbed(post("p1", "x".repeat(250)), "Recruitment");
    expect(embed.title).toBe("New Reply in Recruitment");
    expect(embed.description).toBe(`${"x".repeat(200)}...`);
    expect(embed.color).toBe(EMBED_COLORS.reply);
    expect(embed.url).toBe("https://forum.test/t1-topic#p1");
  });

  it("keeps previews at the limit untouched", () => {
    expect(formatPostEmbed(post("p1", "y".repeat(200)), "Recruitment").description).toBe("y".repeat(200));
  });

  it("keeps emoji whole at the preview limit", () => {
    expect(formatPostEmbed(post("p1", `${"x".repeat(199)}😀`), "Recruitment").description).toBe(`${"x".repeat(199)}😀`);
    expect(formatPostEmbed(post("p1", `${"x".repeat(199)}😀y`), "Recruitment").description).toBe(
      `${"x".repeat(199)}😀...`
    );
  });

  it("says so when a post has no preview", () => {
    expect(formatPostEmbed(post("p1", ""), "Recruitment").description).toBe("*No content preview available*");
  });

  it("formats errors in red", () => {
    expect(formatErrorEmbed("Login failed", "Recruitment")).toEqual({
      title: "⚠️ Monitor Error - Recruitment",
      description: "Login failed",
      color: EMBED_COLORS.error,
      footer: { text: "Forum Monitor" },
    });
  });
});

describe("DiscordNotifier", () => {
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    sleep.mockClear();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("posts one embed per notification", async () => {
    const transport = scripted(204);
    const notifier = new DiscordNotifier(WEBHOOK, { adapter: transport.adapter, sleep });

    await expect(notifier.notifyNewPost(post("p3"), "Recruitment")).resolves.toBe(true);
    expect(transport.bodies).toEqual([{ embeds: [formatPostEmbed(post("p3"), "Recruitment")] }]);
  });

  it("retries once after the delay Discord asks for", async () => {
    const transport = scripted({ status: 429, data: { retry_after: 1.5 } }, 204);
    const notifier = new DiscordNotifier(WEBHOOK, { adapter: transport.adapter, sleep });

    await expect(notifier.notifyNewThread(thread("t1"), "Announcements")).resolves.toBe(true);
    expect(transport.calls()).toBe(2);
    expect(sleep).toHaveBeenCalledWith(1500);
  });

  it("falls back to the Retry-After header, then to five seconds", async () => {
    const withHeader = scripted({ status: 429, headers: { "retry-after": "3" } }, 204);
    await new DiscordNotifier(WEBHOOK, { adapter: withHeader.adapter, sleep }).notifyNewPost(post("p1"), "T");
    expect(sleep).toHaveBeenLastCalledWith(3000);

    const bare = scripted(429, 204);
    await new DiscordNotifier(WEBHOOK, { adapter: bare.adapter, sleep }).notifyNewPost(post("p1"), "T");
    expect(sleep).toHaveBeenLastCalledWith(5000);
  });

  it("gives up after a single retry", async () => {
    const transport = scripted(429);
    const notifier = new DiscordNotifier(WEBHOOK, { adapter: transport.adapter, sleep });

    await expect(notifier.notifyNewPost(post("p1"), "Recruitment")).resolves.toBe(false);
    expect(transport.calls()).toBe(2);
  });

  it("reports server errors and transport failures as false", async () => {
    const failing = scripted(500);
    await expect(
      new DiscordNotifier(WEBHOOK, { adapter: failing.adapter, sleep }).notifyNewPost(post("p1"), "T")
    ).resolves.toBe(false);

    const broken: AxiosAdapter = async () => {
      throw new Error("socket hang up");
    };
    await expect(new DiscordNotifier(WEBHOOK, { adapter: broken, sleep }).notifyNewPost(post("p1"), "T")).resolves.toBe(
      false
    );
  });

  it("does not retry error notifications", async () => {
    const transport = scripted(429, 204);
    const notifier = new DiscordNotifier(WEBHOOK, { adapter: transport.adapter, sleep });

    await expect(notifier.notifyError("boom", "Recruitment")).resolves.toBe(false);
    expect(transport.calls()).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("pauses after every fourth message but not after the last", async () => {
    const transport = scripted(204);
    const notifier = new DiscordNotifier(WEBHOOK, { adapter: transport.adapter, sleep });

    const nine = ["t1", "t2", "t3", "t4", "t5", "t6", "t7", "t8", "t9"].map(thread);
    await expect(notifier.notifyNewThreads(nine, "Announcements")).resolves.toBe(9);
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);

    sleep.mockClear();
    const eight = nine.slice(0, 8);
    await expect(notifier.notifyNewThreads(eight, "Announcements")).resolves.toBe(8);
    expect(sleep.mock.calls).toEqual([[2000]]);
  });

  it("counts only the messages that went through", async () => {
    const transport = scripted(204, 500, 204);
    const notifier = new DiscordNotifier(WEBHOOK, { adapter: transport.adapter, sleep });

    await expect(notifier.notifyNewPosts([post("p1"), post("p2"), post("p3")], "Recruitment")).resolves.toBe(2);
    expect(transport.calls()).toBe(3);
  });

  it("sends nothing for an empty batch", async () => {
    const transport = scripted(204);
    const notifier = new DiscordNotifier(WEBHOOK, { adapter: transport.adapter, sleep });

    await expect(notifier.notifyNewPosts([], "Recruitment")).resolves.toBe(0);
    expect(transport.calls()).toBe(0);
  });

  it("sends a test embed", async () => {
    const transport = scripted(204);
    await expect(new DiscordNotifier(WEBHOOK, { adapter: transport.adapter, sleep }).testWebhook()).resolves.toBe(true);
    expect(transport.bodies).toEqual([
      {
        embeds: [
          {
            title: "✅ Forum Monitor Test",
            description: "Webhook connection successful!",
            color: EMBED_COLORS.thread,
            footer: { text: "Forum Monitor" },
          },
        ],
      },
    ]);
  });
});
