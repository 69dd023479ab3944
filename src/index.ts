#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import {
  type AppConfig,
  type MonitorDescriptor,
  loadAppConfig,
  loadMonitorDescriptors,
  loadStatePath,
  resolveMonitor,
  resolveWebhookUrl,
} from "./config.js";
import { DiscordNotifier } from "./discord.js";
import { errorMessage } from "./errors.js";
import { ForumClient } from "./forum.js";
import { type MonitorDeps, runMonitorOnce } from "./monitor.js";
import { exitCodeFor, startSchedule } from "./schedule.js";
import { CursorStore } from "./store.js";

loadDotenv();

function buildDeps(appConfig: AppConfig): MonitorDeps {
  return {
    store: new CursorStore(appConfig.STATE_FILE_PATH),
    createClient: (monitor) =>
      new ForumClient(monitor.forumUrl, appConfig.FORUM_USERNAME, appConfig.FORUM_PASSWORD, {
        timeoutMs: appConfig.REQUEST_TIMEOUT_MS,
      }),
    createNotifier: (webhookUrl) => new DiscordNotifier(webhookUrl),
  };
}

function printStatus(store: CursorStore): number {
  store.load();
  const rows = store.summary();
  if (rows.length === 0) {
    console.log("[BOT] No monitors tracked yet");
    return 0;
  }
  for (const row of rows) {
    const detail =
      row.kind === "forum" ? `${row.tracked} thread(s) seen` : `last post ${row.lastPostId ?? "-"}, ${row.tracked} post(s)`;
    console.log(`${row.monitorId} [${row.kind}] checked ${row.lastCheckedAt}: ${detail}`);
  }
  return 0;
}

async function testWebhooks(descriptors: MonitorDescriptor[]): Promise<number> {
  const urls = new Set<string>();
  for (const descriptor of descriptors) {
    try {
      urls.add(resolveWebhookUrl(resolveMonitor(descriptor)));
    } catch (err) {
      console.error(`[BOT] ${errorMessage(err)}`);
    }
  }

  let failures = 0;
  for (const url of urls) {
    if (!(await new DiscordNotifier(url).testWebhook())) failures++;
  }
  console.log(`[BOT] Tested ${urls.size} webhook(s), ${failures} failed`);
  return failures === 0 && urls.size > 0 ? 0 : 1;
}

// Resolves to an exit code, or null while a schedule keeps the process alive
async function main(args: string[]): Promise<number | null> {
  if (args.includes("--status")) return printStatus(new CursorStore(loadStatePath()));

  const appConfig = loadAppConfig();
  const deps = buildDeps(appConfig);

  const descriptors = loadMonitorDescriptors(appConfig.MONITORS_CONFIG_PATH);
  if (args.includes("--test-webhooks")) return testWebhooks(descriptors);

  if (appConfig.MONITOR_CRON) {
    await startSchedule(appConfig.MONITOR_CRON, () => runMonitorOnce(descriptors, deps));
    return null;
  }

  console.log("[BOT] Forum monitor starting");
  const summary = await runMonitorOnce(descriptors, deps);
  return exitCodeFor(summary);
}

main(process.argv.slice(2))
  .then((code) => {
    if (code !== null) process.exitCode = code;
  })
  .catch((e) => {
    console.error("[BOT] Fatal:", errorMessage(e));
    process.exit(1);
  });
