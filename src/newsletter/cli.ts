#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import { type App, createApp, stateFilePath } from "./app.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./core/errors.js";
import { createOutputWriter } from "./core/output.js";
import { StateManager } from "./core/state.js";
import type { RunSummary } from "./core/types.js";
import type { DeviceCodePrompt, FolderNode } from "./graph/types.js";
import { exportArchive } from "./store/archive.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

function showDeviceCode(prompt: DeviceCodePrompt): void {
  console.error(`\n${prompt.message}\n`);
}

function openApp(interactive = true): App {
  return createApp(loadConfig(), { interactive, onDeviceCode: showDeviceCode });
}

function positiveInt(value: string, name: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

function printSummary(s: RunSummary): void {
  console.log("\n═══ Ingestion Summary ═══\n");
  if (s.aborted) {
    console.log(`✗ Aborted: ${s.abortReason ?? "unknown reason"}`);
  }
  const status = s.aborted || s.errors > 0 ? "⚠" : "✓";
  console.log(
    `${status} ${s.folder ?? "(no folder)"}: ${s.fetched} fetched, ${s.persisted} stored, ${s.skipped} skipped, ${s.rejected} rejected, ${s.errors} failed [${(s.durationMs / 1000).toFixed(1)}s]`,
  );
  const notable = s.outcomes.filter(
    (o) => o.state === "rejected" || o.state === "errored",
  );
  for (const o of notable.slice(0, 10)) {
    console.log(`  ✗ ${o.subject || o.messageId}: ${o.reason ?? o.state}`);
  }
  if (notable.length > 10) {
    console.log(`  ... and ${notable.length - 10} more`);
  }
}

function printTree(nodes: FolderNode[], depth = 0): void {
  for (const node of nodes) {
    console.log(`${"  ".repeat(depth)}${node.displayName}  (${node.id})`);
    printTree(node.children, depth + 1);
  }
}

const program = new Command()
  .name("newsletter-ingest")
  .description("Ingest newsletters from a Microsoft 365 mailbox into a local store")
  .version("1.0.0");

program
  .command("ingest")
  .description("Run one ingestion over the configured folder")
  .option("--force", "Re-ingest messages that are already stored")
  .option("--no-interactive", "Fail instead of prompting for device-code sign-in")
  .action(async (opts: { force?: boolean; interactive: boolean }) => {
    const app = openApp(opts.interactive);
    try {
      const summary = await app.engine.runIngestion({ force: opts.force ?? false });
      if (!summary) {
        console.log("Ingestion already in progress");
        return;
      }
      printSummary(summary);
      process.exitCode = summary.aborted || summary.errors > 0 ? 1 : 0;
    } finally {
      app.close();
    }
  });

program
  .command("daemon")
  .description("Ingest on a fixed interval until interrupted")
  .option("--interval <minutes>", "Minutes between runs", "15")
  .action(async (opts: { interval: string }) => {
    const intervalMs = positiveInt(opts.interval, "--interval") * 60_000;
    const app = openApp(false);
    const ac = new AbortController();

    const shutdown = () => {
      if (ac.signal.aborted) return;
      console.log("\n[daemon] Graceful shutdown requested, finishing current run...");
      ac.abort();
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    console.log(`[daemon] Ingesting every ${opts.interval} minute(s)`);
    try {
      await app.engine.runEvery(intervalMs, ac.signal, printSummary);
    } finally {
      process.removeListener("SIGINT", shutdown);
      process.removeListener("SIGTERM", shutdown);
      app.close();
    }
  });

program
  .command("status")
  .description("Show the last ingestion run")
  .action(() => {
    const { lastRunAt, lastSummary } = new StateManager(
      stateFilePath(loadConfig()),
    ).getState();
    if (!lastRunAt || !lastSummary) {
      console.log("No ingestion has run yet");
      return;
    }
    console.log(`Last run finished ${lastRunAt}`);
    printSummary(lastSummary);
  });

program
  .command("list")
  .description("List recently ingested newsletters")
  .option("--limit <n>", "Number of newsletters", "20")
  .action((opts: { limit: string }) => {
    const app = openApp(false);
    try {
      const records = app.store.listRecent(positiveInt(opts.limit, "--limit"));
      if (records.length === 0) {
        console.log("No newsletters stored");
        return;
      }
      for (const r of records) {
        const flag = r.status === "published" ? " " : "D";
        console.log(`${flag} ${r.receivedAt.slice(0, 10)}  ${r.senderName}: ${r.subject}`);
      }
      console.log(`\n${app.store.count()} newsletter(s) in total`);
    } finally {
      app.close();
    }
  });

program
  .command("export")
  .description("Write published newsletters as Markdown with YAML frontmatter")
  .option("--output <dir>", "Output directory", "./archive")
  .option("--limit <n>", "Number of newsletters", "50")
  .action(async (opts: { output: string; limit: string }) => {
    const app = openApp(false);
    try {
      const result = await exportArchive(app.store, createOutputWriter(opts.output), {
        limit: positiveInt(opts.limit, "--limit"),
      });
      console.log(
        `Wrote ${result.written.length} file(s) to ${opts.output} (${result.skipped} draft(s) skipped)`,
      );
    } finally {
      app.close();
    }
  });

program
  .command("folders")
  .description("Show the mailbox folder tree with folder ids")
  .action(async () => {
    const app = openApp();
    try {
      printTree(await app.folders.listTree());
    } finally {
      app.close();
    }
  });

const auth = program.command("auth").description("Manage the cached Graph credential");

auth
  .command("login")
  .description("Sign in with a device code and cache the credential")
  .action(async () => {
    const app = openApp();
    try {
      const token = await app.tokens.acquire();
      console.log(
        `✓ Signed in as ${token.account}; token valid until ${new Date(token.expiresAt).toISOString()}`,
      );
    } finally {
      app.close();
    }
  });

auth
  .command("status")
  .description("Show whether a usable credential is cached")
  .action(async () => {
    const app = openApp(false);
    try {
      const s = await app.tokens.status();
      if (!s.cached) {
        console.log(`${s.account}: not signed in`);
        return;
      }
      const expiry = s.expiresAt === null ? "unknown" : new Date(s.expiresAt).toISOString();
      console.log(`${s.account}: access token ${s.expired ? "expired" : "valid"} (expires ${expiry})`);
      console.log(`refresh token: ${s.hasRefreshToken ? "present" : "missing"}`);
    } finally {
      app.close();
    }
  });

auth
  .command("logout")
  .description("Remove the cached credential")
  .action(async () => {
    const app = openApp(false);
    try {
      const removed = await app.tokens.signOut();
      console.log(removed ? "✓ Signed out" : "No cached credential");
    } finally {
      app.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`✗ ${errorMessage(err)}`);
  process.exit(1);
});
