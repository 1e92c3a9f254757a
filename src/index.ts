#!/usr/bin/env node
import "dotenv/config";
import { startChat } from "./chat.js";
import { loadRagConfig, type RagConfig } from "./rag/config.js";
import { OpenRouterEmbeddingService } from "./rag/embedding-service.js";
import { errorMessage } from "./rag/errors.js";
import { OpenRouterGenerationService } from "./rag/generation-service.js";
import {
  createRagDeps,
  createRunCoordinator,
  openCorpus,
  openStore,
  runFailed,
  type RagDeps,
} from "./rag/pipeline.js";
import type { Log } from "./rag/types.js";

const USAGE = `Usage:
  corpus-rag run [--config <file>]
  corpus-rag ask <question...> [--corpus <prefix>] [--config <file>]
  corpus-rag validate <documentId> [--config <file>]
  corpus-rag chat [--config <file>]`;

interface CliArgs {
  command: string | undefined;
  positional: string[];
  config?: string;
  corpus?: string;
}

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let config: string | undefined;
  let corpus: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg === "--config" || arg === "--corpus") {
      const value = argv[++i];
      if (!value) throw new Error(`${arg} requires a value`);
      if (arg === "--config") config = value;
      else corpus = value;
    } else if (arg.startsWith("--config=")) {
      config = arg.slice("--config=".length);
    } else if (arg.startsWith("--corpus=")) {
      corpus = arg.slice("--corpus=".length);
    } else {
      positional.push(arg);
    }
  }

  const [command, ...rest] = positional;
  return { command, positional: rest, config, corpus };
}

function requireApiKey(): string {
  const apiKey = process.env["OPENROUTER_API_KEY"];
  if (!apiKey) {
    console.error("Error: OPENROUTER_API_KEY environment variable is required.");
    console.error("  export OPENROUTER_API_KEY=your-key");
    process.exit(1);
  }
  return apiKey;
}

function buildDeps(config: RagConfig, apiKey: string, log: Log): RagDeps {
  return createRagDeps(config, {
    embeddings: new OpenRouterEmbeddingService(apiKey, config),
    generation: new OpenRouterGenerationService(apiKey, config),
    log,
  });
}

/** Abort the run on the first Ctrl+C; a second one exits immediately. */
function abortOnSigint(log: Log): AbortController {
  const controller = new AbortController();
  process.on("SIGINT", () => {
    if (controller.signal.aborted) process.exit(130);
    log("RAG: cancelling, in-flight documents will roll back (Ctrl+C again to force quit)");
    controller.abort();
  });
  return controller;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const stderrLog: Log = (msg) => console.error(msg);

  switch (args.command) {
    case "run": {
      const config = await loadRagConfig(args.config);
      const deps = buildDeps(config, requireApiKey(), stderrLog);
      const controller = abortOnSigint(stderrLog);
      const report = await createRunCoordinator(deps).run({ signal: controller.signal });
      process.exitCode = runFailed(report) || report.cancelled ? 1 : 0;
      return;
    }

    case "ask": {
      const question = args.positional.join(" ").trim();
      if (!question) {
        console.error(USAGE);
        process.exitCode = 2;
        return;
      }
      const config = await loadRagConfig(args.config);
      const deps = buildDeps(config, requireApiKey(), stderrLog);
      await openCorpus(deps);
      const result = await createRunCoordinator(deps).ask(question, { corpusSelector: args.corpus });
      console.log(result.answer);
      if (result.grounded) {
        console.log("");
        console.log(`Sources: ${result.sources}`);
        for (const citation of result.citations) console.log(`  ${citation}`);
      }
      return;
    }

    case "validate": {
      const [documentId] = args.positional;
      if (!documentId) {
        console.error(USAGE);
        process.exitCode = 2;
        return;
      }
      const config = await loadRagConfig(args.config);
      // Inspection reads the store only; no gateway calls are made.
      const deps = buildDeps(config, process.env["OPENROUTER_API_KEY"] ?? "", stderrLog);
      await openStore(deps);
      const report = await createRunCoordinator(deps).validate(documentId);
      console.log(JSON.stringify(report, null, 2));
      process.exitCode = report.valid ? 0 : 1;
      return;
    }

    case "chat": {
      const config = await loadRagConfig(args.config);
      const apiKey = requireApiKey();
      startChat((log) => createRunCoordinator(buildDeps(config, apiKey, log)), {
        title: "corpus-rag",
        refreshOnStart: true,
      });
      return;
    }

    default:
      console.error(USAGE);
      process.exitCode = args.command === undefined || args.command === "help" ? 0 : 2;
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
