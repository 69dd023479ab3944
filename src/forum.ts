import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import { parseHTML } from "linkedom";
import { FetchError, errorMessage, toError } from "./errors.js";
import type { ForumSource, PostRecord, ThreadRecord } from "./types.js";
import {
  type Sleep,
  absoluteUrl,
  collapseWhitespace,
  extractThreadId,
  sleep,
  truncate,
  uniqueById,
} from "./utils.js";

type HtmlDocument = ReturnType<typeof parseHTML>["document"];
type HtmlElement = NonNullable<ReturnType<HtmlDocument["querySelector"]>>;

const BROWSER_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
  DNT: "1",
  "Upgrade-Insecure-Requests": "1",
};

const MAX_REDIRECTS = 5;
const CONTENT_PREVIEW_LENGTH = 500;
const POST_ID = /^p\d+$/;

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "";
  }
}

function text(el: HtmlElement | null | undefined): string {
  return collapseWhitespace(el?.textContent ?? "");
}

// True when any single class token matches, or the whole class attribute does.
function matchesClass(el: HtmlElement, pattern: RegExp): boolean {
  const cls = el.getAttribute("class") ?? "";
  if (!cls) return false;
  return cls.split(/\s+/).some((token: string) => pattern.test(token)) || pattern.test(cls);
}

function findByClass(root: HtmlElement, pattern: RegExp, selector = "*"): HtmlElement | undefined {
  const candidates: HtmlElement[] = Array.from(root.querySelectorAll(selector));
  return candidates.find((el) => matchesClass(el, pattern));
}

function parseCustomThemeThread(container: HtmlElement, baseUrl: string): ThreadRecord | null {
  const topic = container.querySelector("div.unr-listopic-topic");
  if (!topic) return null;

  if (text(topic.querySelector("strong")).includes("Nota")) {
    console.log("[FORUM] Skipping pinned note");
    return null;
  }

  const link = topic.querySelector("a");
  if (!link) return null;

  const href = link.getAttribute("href") ?? "";
  const url = href ? absoluteUrl(href, baseUrl) : "";
  const id = extractThreadId(url);
  if (!id) return null;

  const info = container.querySelector("div.unr-listopic-info");
  const author = text(info?.querySelector("a")) || "Unknown";

  let lastPostDate = "";
  if (info) {
    const rows: HtmlElement[] = Array.from(info.querySelectorAll("div"));
    if (rows.length >= 3) {
      // "12/03/2024, 10:00 por someone"
      lastPostDate = text(rows[2]).split("por")[0].trim();
    }
  }

  return { id, title: text(link), author, url, lastPostDate };
}

function parsePhpbbThread(row: HtmlElement, baseUrl: string): ThreadRecord | null {
  const link = row.querySelector("a.topictitle");
  if (!link) return null;

  const href = link.getAttribute("href") ?? "";
  const url = href ? absoluteUrl(href, baseUrl) : "";
  const id = extractThreadId(url);
  if (!id) return null;

  const byLine = /(?:by|par)\s+(.+?)(?:\s+»|\s*$)/i.exec(text(row.querySelector("dt")));
  const author = byLine ? byLine[1].trim() : "Unknown";

  let lastPostDate = "";
  const dd = row.querySelector("dd");
  if (dd) {
    const dateEl = findByClass(dd, /time|date/);
    lastPostDate = dateEl ? text(dateEl) : text(dd);
  }

  return { id, title: text(link), author, url, lastPostDate };
}

/**
 * Threads listed on a forum section page, in page order. Understands the
 * "unr" custom theme and falls back to the stock phpBB topic list.
 */
export function parseSectionThreads(html: string, sectionUrl: string): ThreadRecord[] {
  const { document } = parseHTML(html);
  const threads: ThreadRecord[] = [];

  const custom: HtmlElement[] = Array.from(document.querySelectorAll("div.unr-wtp"));
  if (custom.length > 0) {
    for (const container of custom) {
      const thread = parseCustomThemeThread(container, sectionUrl);
      if (thread) threads.push(thread);
    }
  } else {
    const rows: HtmlElement[] = Array.from(document.querySelectorAll("dl"));
    for (const row of rows.filter((el) => matchesClass(el, /topic/))) {
      const thread = parsePhpbbThread(row, sectionUrl);
      if (thread) threads.push(thread);
    }
  }

  return uniqueById(threads);
}

function postIdOf(el: HtmlElement): string | null {
  const own = el.getAttribute("id");
  if (own) return own;

  for (let parent = el.parentElement; parent; parent = parent.parentElement) {
    const id = parent.getAttribute("id");
    if (id && POST_ID.test(id)) return id;
  }

  const anchors: HtmlElement[] = Array.from(el.querySelectorAll("a[id]"));
  const anchor = anchors.find((a) => POST_ID.test(a.getAttribute("id") ?? ""));
  return anchor?.getAttribute("id") ?? null;
}

function parsePost(el: HtmlElement, threadUrl: string): PostRecord | null {
  const id = postIdOf(el);
  if (!id) return null;

  const author = text(findByClass(el, /author|username|postername/)) || "Unknown";
  const content = truncate(text(findByClass(el, /content|postbody|message-text/)), CONTENT_PREVIEW_LENGTH);
  const timestamp = text(findByClass(el, /time|date|postdate/));

  return { id, author, content, timestamp, url: `${threadUrl}#${id}` };
}

/**
 * Posts of a thread page in the order they appear, which is posting order.
 */
export function parseThreadPosts(html: string, threadUrl: string): PostRecord[] {
  const { document } = parseHTML(html);

  let elements: HtmlElement[] = Array.from(document.querySelectorAll("div"));
  elements = elements.filter((el) => matchesClass(el, /post\s|postbody|message/));
  if (elements.length === 0) {
    const cells: HtmlElement[] = Array.from(document.querySelectorAll("td"));
    elements = cells.filter((el) => matchesClass(el, /post|message/));
  }

  const posts: PostRecord[] = [];
  for (const el of elements) {
    const post = parsePost(el, threadUrl);
    if (post) posts.push(post);
  }
  // Nested post containers resolve to the same ID; the outermost comes first
  return uniqueById(posts);
}

export function hasLogoutLink(html: string): boolean {
  const { document } = parseHTML(html);
  const links: HtmlElement[] = Array.from(document.querySelectorAll("a[href]"));
  return links.some((a) => (a.getAttribute("href") ?? "").includes("/logout"));
}

interface Page {
  url: string;
  html: string;
}

export interface ForumClientOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  adapter?: AxiosAdapter;
  sleep?: Sleep;
}

/**
 * Session against one forum. Cookies are kept per instance, so create one
 * client per monitor run.
 */
export class ForumClient implements ForumSource {
  readonly forumUrl: string;

  private readonly http: AxiosInstance;
  // Keyed by host, then cookie name
  private readonly cookies = new Map<string, Map<string, string>>();
  private readonly maxAttempts: number;
  private readonly sleep: Sleep;

  constructor(
    forumUrl: string,
    private readonly username: string,
    private readonly password: string,
    options: ForumClientOptions = {}
  ) {
    this.forumUrl = forumUrl.replace(/\/+$/, "");
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.sleep = options.sleep ?? sleep;
    this.http = axios.create({
      timeout: options.timeoutMs ?? 30000,
      adapter: options.adapter,
      headers: BROWSER_HEADERS,
      responseType: "text",
      // Redirects are followed in request() so cookies set along the way are kept
      maxRedirects: 0,
      validateStatus: (status) => status >= 200 && status < 400,
    });
  }

  async authenticate(): Promise<boolean> {
    try {
      const loginPage = await this.request("get", absoluteUrl("/login", this.forumUrl));
      const { document } = parseHTML(loginPage.html);
      const forms: HtmlElement[] = Array.from(document.querySelectorAll("form"));
      const form = forms.find((f) => (f.getAttribute("method") ?? "").toLowerCase() === "post");
      if (!form) {
        console.error("[FORUM] Could not find login form");
        return false;
      }

      const action = absoluteUrl(form.getAttribute("action") || "/login", this.forumUrl);
      const payload = new URLSearchParams({
        username: this.username,
        password: this.password,
        login: "Log in",
        autologin: "on",
        redirect: "",
      });

      const result = await this.request("post", action, payload);
      if (hasLogoutLink(result.html)) {
        console.log(`[FORUM] Logged in to ${this.forumUrl} as ${this.username}`);
        return true;
      }

      const page = parseHTML(result.html).document;
      const body: HtmlElement | null = page.querySelector("body");
      const notice = body ? findByClass(body, /error|message/) : undefined;
      if (notice) {
        console.error(`[FORUM] Login failed: ${text(notice)}`);
        return false;
      }

      // Some themes hide the logout link; the username on the page is the next best signal
      if (result.html.toLowerCase().includes(this.username.toLowerCase())) {
        console.warn("[FORUM] No logout link found but the username is on the page, continuing");
        return true;
      }

      console.error("[FORUM] Login failed: no logout link found");
      return false;
    } catch (err) {
      console.error(`[FORUM] Login error: ${errorMessage(err)}`);
      return false;
    }
  }

  async fetchSectionThreads(sectionUrl: string): Promise<ThreadRecord[]> {
    try {
      const page = await this.getWithRetry(sectionUrl);
      const threads = parseSectionThreads(page.html, sectionUrl);
      if (threads.length === 0) {
        console.warn(`[FORUM] No threads found in ${sectionUrl}`);
      } else {
        console.log(`[FORUM] Found ${threads.length} thread(s) in ${sectionUrl}`);
      }
      return threads;
    } catch (err) {
      console.error(`[FORUM] Error fetching forum section: ${errorMessage(err)}`);
      return [];
    }
  }

  async fetchThreadPosts(threadUrl: string): Promise<PostRecord[]> {
    try {
      const page = await this.getWithRetry(threadUrl);
      const posts = parseThreadPosts(page.html, threadUrl);
      if (posts.length === 0) {
        console.warn(`[FORUM] No posts found in ${threadUrl}`);
      } else {
        console.log(`[FORUM] Found ${posts.length} post(s) in ${threadUrl}`);
      }
      return posts;
    } catch (err) {
      console.error(`[FORUM] Error fetching thread: ${errorMessage(err)}`);
      return [];
    }
  }

  private async getWithRetry(url: string): Promise<Page> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.request("get", url);
      } catch (err) {
        if (attempt >= this.maxAttempts) {
          throw new FetchError(
            `Request to ${url} failed after ${attempt} attempt(s): ${errorMessage(err)}`,
            url,
            toError(err)
          );
        }
        const wait = 1000 * 2 ** (attempt - 1);
        console.warn(`[FORUM] Request failed (attempt ${attempt}/${this.maxAttempts}), retrying in ${wait}ms`);
        await this.sleep(wait);
      }
    }
  }

  private async request(method: "get" | "post", url: string, body?: URLSearchParams): Promise<Page> {
    let current = url;
    let currentMethod = method;
    let currentBody = body;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const cookie = this.cookieHeader(current);
      const res = await this.http.request<unknown>({
        method: currentMethod,
        url: current,
        data: currentBody,
        headers: cookie ? { Cookie: cookie } : undefined,
      });
      this.storeCookies(res, current);

      const location: unknown = res.headers["location"];
      if (res.status >= 300 && res.status < 400 && typeof location === "string") {
        current = absoluteUrl(location, current);
        // 307 and 308 repeat the request as it was sent
        if (res.status !== 307 && res.status !== 308) {
          currentMethod = "get";
          currentBody = undefined;
        }
        continue;
      }

      return { url: current, html: typeof res.data === "string" ? res.data : "" };
    }

    throw new FetchError(`Too many redirects starting at ${url}`, url);
  }

  private cookieHeader(url: string): string {
    const jar = this.cookies.get(hostOf(url));
    return jar ? [...jar].map(([name, value]) => `${name}=${value}`).join("; ") : "";
  }

  private storeCookies(res: AxiosResponse<unknown>, url: string): void {
    const host = hostOf(url);
    const jar = this.cookies.get(host) ?? new Map<string, string>();
    this.cookies.set(host, jar);
    const header: unknown = res.headers["set-cookie"];
    const lines: unknown[] = Array.isArray(header) ? header : [header];
    for (const line of lines) {
      if (typeof line !== "string") continue;
      const pair = line.split(";")[0];
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      if (value === "" || value === "deleted") {
        jar.delete(name);
      } else {
        jar.set(name, value);
      }
    }
  }
}
