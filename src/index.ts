#!/usr/bin/env node
import "dotenv/config";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { loadConfig } from "./rag/config.js";
import { errorMessage } from "./rag/errors.js";
import { createRagService, type RagService } from "./rag/pipeline.js";
import type { BoundaryResult, QueryRunResult } from "./rag/types.js";

const USAGE = `Usage: verified-rag <command> [args]

Commands:
  domains                                   List domain collections
  create <domain>                           Create an empty domain collection
  docs <domain>                             List documents in a domain
  ingest <domain> <file>                    Extract, chunk and index a file
  ask <domain> <question> [--max-attempts N] [--no-verify]
  rm-doc <domain> <document-id>             Delete one document
  rm-domain <domain>                        Delete a domain and all its chunks`;

// ── Output ──────────────────────────────────────────────────────────────────
function log(msg: string): void {
  console.error(`\x1b[90m${msg}\x1b[0m`);
}

function unwrap<T>(result: BoundaryResult<T>): T {
  if (!result.ok) {
    throw new Error(result.reason === "not_found" ? `not found: ${result.error}` : result.error);
  }
  return result.value;
}

function printRun(run: QueryRunResult): void {
  console.log(run.answer);
  console.log("");

  for (const ref of run.references) {
    console.log(`  [Source ${ref.sourceId}] ${ref.filename} (score ${ref.relevanceScore.toFixed(3)})`);
  }
  for (const attempt of run.attempts) {
    const detail =
      attempt.status === "no_context"
        ? "no context"
        : `confidence ${attempt.confidence.toFixed(2)}${attempt.verified ? ", verified" : ""}`;
    console.log(`  attempt ${attempt.attempt}: ${detail} | "${attempt.queryUsed}"`);
  }

  console.log(`verified: ${run.verified}  confidence: ${run.confidence.toFixed(2)}`);
  if (run.warning) console.log(`warning: ${run.warning}`);
  if (run.error) console.log(`error: ${run.error}`);
}

// ── Commands ────────────────────────────────────────────────────────────────
function takeArg(args: string[], index: number, name: string): string {
  const value = args[index];
  if (!value) throw new Error(`Missing <${name}>\n\n${USAGE}`);
  return value;
}

async function runCommand(service: RagService, argv: string[]): Promise<void> {
  const [command, ...args] = argv;

  switch (command) {
    case "domains": {
      const collections = unwrap(await service.listCollections());
      if (collections.length === 0) console.log("No domains yet.");
      for (const c of collections) {
        console.log(`${c.displayName}\t${c.name}\t${c.chunkCount} chunks`);
      }
      return;
    }
    case "create": {
      const info = unwrap(await service.createCollection(takeArg(args, 0, "domain")));
      console.log(`${info.displayName} → ${info.name}`);
      return;
    }
    case "docs": {
      const docs = unwrap(await service.documentsOf(takeArg(args, 0, "domain")));
      for (const d of docs) console.log(`${d.documentId}\t${d.filename}`);
      return;
    }
    case "ingest": {
      const domain = takeArg(args, 0, "domain");
      const file = takeArg(args, 1, "file");
      const bytes = await readFile(file);
      const doc = unwrap(await service.ingestFile(domain, path.basename(file), bytes));
      console.log(`${doc.documentId}\t${doc.filename}\t${doc.chunksAdded} chunks`);
      return;
    }
    case "ask": {
      const domain = takeArg(args, 0, "domain");
      const rest = args.slice(1);
      const verify = !rest.includes("--no-verify");
      const flagIdx = rest.indexOf("--max-attempts");
      const maxAttempts = flagIdx >= 0 ? Number(rest[flagIdx + 1]) : undefined;
      const skip = new Set(flagIdx >= 0 ? [flagIdx, flagIdx + 1] : []);
      const question = rest.filter((arg, i) => arg !== "--no-verify" && !skip.has(i)).join(" ");
      printRun(unwrap(await service.query(domain, question, { maxAttempts, verify })));
      return;
    }
    case "rm-doc":
      console.log(
        unwrap(await service.deleteDocument(takeArg(args, 0, "domain"), takeArg(args, 1, "document-id"))),
      );
      return;
    case "rm-domain":
      console.log(unwrap(await service.deleteCollection(takeArg(args, 0, "domain"))));
      return;
    default:
      throw new Error(USAGE);
  }
}

// ── Main ────────────────────────────────────────────────────────────────────
async function main(): Promise<void> {
  const config = loadConfig();
  const service = createRagService(config, log);
  await runCommand(service, process.argv.slice(2));
}

main().catch((err: unknown) => {
  console.error(`error: ${errorMessage(err)}`);
  process.exit(1);
});
