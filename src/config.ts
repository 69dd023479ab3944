import { z } from "zod";
import fs from "node:fs";
import path from "node:path";
import { ConfigurationError, errorMessage } from "./errors.js";
import type { Monitor } from "./types.js";

export const DEFAULT_WEBHOOK_ENV = "DISCORD_WEBHOOK_URL";

const stateSchema = z.object({
  STATE_FILE_PATH: z.string().default("data/state.json"),
});

const schema = stateSchema.extend({
  FORUM_USERNAME: z.string().min(1),
  FORUM_PASSWORD: z.string().min(1),
  MONITORS_CONFIG_PATH: z.string().default("config/monitors.json"),
  MONITOR_CRON: z
    .string()
    .optional()
    .transform((v) => v?.trim() || undefined),
  REQUEST_TIMEOUT_MS: z
    .string()
    .default("30000")
    .transform((v) => Math.max(1000, parseInt(v, 10) || 30000)),
});

export type AppConfig = z.infer<typeof schema>;

function formatIssues(error: z.ZodError): string {
  // Show concise errors without values
  return error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`).join(", ");
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// Enough for --status, which never logs in
export function loadStatePath(env: NodeJS.ProcessEnv = process.env): string {
  const parsed = stateSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data.STATE_FILE_PATH;
}

// Descriptors are only shape-checked here; each is resolved on its own when the run reaches it.
const monitorsFileSchema = z.object({
  monitors: z.array(z.record(z.unknown())),
});

export type MonitorDescriptor = Record<string, unknown>;

export function loadMonitorDescriptors(filePath: string): MonitorDescriptor[] {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(
      `Monitors file not found: ${resolved}. Create it from config/monitors.example.json`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in ${resolved}: ${errorMessage(err)}`);
  }

  const parsed = monitorsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`${resolved} must hold a "monitors" array of objects`);
  }

  const seen = new Set<string>();
  for (const descriptor of parsed.data.monitors) {
    const id = descriptor.id;
    if (typeof id !== "string") continue;
    if (seen.has(id)) {
      throw new ConfigurationError(`Duplicate monitor id "${id}" in ${resolved}`, id);
    }
    seen.add(id);
  }

  console.log(`[CONFIG] Loaded ${parsed.data.monitors.length} monitor(s) from ${resolved}`);
  return parsed.data.monitors;
}

const monitorBase = {
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  forum_url: z.string().url(),
  discord_webhook_env: z.string().min(1).default(DEFAULT_WEBHOOK_ENV),
};

const monitorSchema = z.preprocess(
  (v) => (v && typeof v === "object" && !("type" in v) ? { ...v, type: "thread" } : v),
  z.discriminatedUnion("type", [
    z.object({ ...monitorBase, type: z.literal("forum"), section_url: z.string().url() }),
    z.object({ ...monitorBase, type: z.literal("thread"), thread_url: z.string().url() }),
  ])
);

export function isEnabled(descriptor: MonitorDescriptor): boolean {
  return descriptor.enabled !== false;
}

export function describeMonitor(descriptor: MonitorDescriptor): string {
  return typeof descriptor.id === "string" && descriptor.id ? descriptor.id : "(no id)";
}

export function resolveMonitor(descriptor: MonitorDescriptor): Monitor {
  const parsed = monitorSchema.safeParse(descriptor);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Incomplete configuration for monitor ${describeMonitor(descriptor)}: ${formatIssues(parsed.error)}`,
      describeMonitor(descriptor)
    );
  }

  const m = parsed.data;
  if (m.type === "forum") {
    return {
      type: "forum",
      id: m.id,
      name: m.name ?? "Forum",
      forumUrl: m.forum_url,
      sectionUrl: m.section_url,
      webhookEnv: m.discord_webhook_env,
    };
  }
  return {
    type: "thread",
    id: m.id,
    name: m.name ?? "Thread",
    forumUrl: m.forum_url,
    threadUrl: m.thread_url,
    webhookEnv: m.discord_webhook_env,
  };
}

export function resolveWebhookUrl(monitor: Monitor, env: NodeJS.ProcessEnv = process.env): string {
  const url = env[monitor.webhookEnv]?.trim();
  if (!url) {
    throw new ConfigurationError(`Environment variable ${monitor.webhookEnv} not set`, monitor.id);
  }
  return url;
}
