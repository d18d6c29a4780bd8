#!/usr/bin/env node
import { fileURLToPath } from "node:url";
import path from "node:path";

import { loadConfigFromDotenv } from "../config.js";
import { LearningDatabase } from "../db/learningDatabase.js";
import { listObservations, printEvents, printStats } from "./listObservations.js";

type CliArgs = {
  _: string[];
  flags: Record<string, string | true>;
};

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { _: [], flags: {} };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (!token.startsWith("--")) {
      out._.push(token);
      continue;
    }

    const eq = token.indexOf("=");
    if (eq !== -1) {
      out.flags[token.slice(2, eq)] = token.slice(eq + 1);
      continue;
    }

    const k = token.slice(2);
    const next = argv[i + 1];

    if (next !== undefined && !next.startsWith("--")) {
      out.flags[k] = next;
      i++;
    } else {
      out.flags[k] = true;
    }
  }

  return out;
}

function flag(args: CliArgs, name: string): string | undefined {
  const v = args.flags[name];
  return typeof v === "string" ? v.trim() : undefined;
}

export async function runAdminCli(argv: string[]) {
  const args = parseCliArgs(argv);
  const config = loadConfigFromDotenv();

  const dbPath = flag(args, "db") ?? config.dbPath;
  const db = LearningDatabase.open(dbPath);

  try {
    const cmd = args._[0] ?? "";

    if (cmd === "list") {
      const vendor = flag(args, "vendor");
      if (!vendor) throw new Error("--vendor is required");
      listObservations(db, { vendor, item: flag(args, "item") });
      return;
    }

    if (cmd === "stats") {
      printStats(db);
      return;
    }

    if (cmd === "events") {
      const limit = Number(flag(args, "limit") ?? 20);
      if (!(Number.isInteger(limit) && limit > 0)) throw new Error("--limit must be a positive integer");
      printEvents(db, limit);
      return;
    }

    throw new Error(`Unknown admin command: ${cmd || "(none)"}. Expected list | stats | events.`);
  } finally {
    db.close();
  }
}

const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isEntry) {
  runAdminCli(process.argv.slice(2)).catch((e) => {
    console.error(`[adminCli] ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  });
}
