import { AppError, errorMessage } from "@profile-rag/errors";
import { createLogger, type Logger } from "@profile-rag/logger";
import type { AppConfig, IngestJobData } from "@profile-rag/types";
import { answer } from "@profile-rag/core";
import { QUEUE_NAMES, createIngestQueue, parseRedisConnection } from "@profile-rag/queue";
import {
  createContainer,
  loadConfig,
  runIngestion,
  serializeOutcome,
  type ContainerOverrides,
} from "./container.js";

const USAGE = `Usage: profile-rag <command> [args]

Commands:
  ingest [dir...]        Index the configured source directories (or the given ones)
  enqueue [dir...]       Queue the same run for the worker
  ask <question...>      Answer a question from the indexed documents
  models                 List the models offered by the configured LLM provider`;

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

/** The part of the BullMQ ingest queue the CLI produces into. */
export interface IngestJobProducer {
  add(name: string, data: IngestJobData): Promise<{ id?: string }>;
  close(): Promise<void>;
}

export interface CliOptions {
  env?: Record<string, string | undefined>;
  io?: CliIo;
  logger?: Logger;
  overrides?: ContainerOverrides;
  openQueue?: (config: AppConfig) => IngestJobProducer;
}

function openIngestQueue(config: AppConfig): IngestJobProducer {
  return createIngestQueue(parseRedisConnection(config.redis.url));
}

const COMMANDS = ["ingest", "enqueue", "ask", "models"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? processIo;
  const [command, ...args] = argv;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    io.stdout(USAGE);
    return command ? 0 : 2;
  }
  if (!isCommand(command)) {
    io.stderr(`Unknown command: ${command}\n\n${USAGE}`);
    return 2;
  }

  try {
    const config = loadConfig(options.env);
    // stdout carries command output, logs go to stderr
    const logger =
      options.logger ??
      createLogger({
        level: config.logLevel,
        service: "profile-rag-cli",
        destination: { write: (line: string) => process.stderr.write(line) },
      });
    const container = createContainer(config, logger, options.overrides);

    switch (command) {
      case "ingest": {
        const outcome = await runIngestion(container, { sourceDirs: args });
        io.stdout(JSON.stringify(serializeOutcome(outcome), null, 2));
        return outcome.status === "failed" ? 1 : 0;
      }

      case "enqueue": {
        const queue = (options.openQueue ?? openIngestQueue)(config);
        try {
          const job = await queue.add("ingest", {
            type: "ingest",
            ...(args.length > 0 ? { sourceDirs: args } : {}),
            requestedBy: "cli",
          });
          io.stdout(`Enqueued ingest job ${job.id ?? "(no id)"} on ${QUEUE_NAMES.INGEST}`);
        } finally {
          await queue.close();
        }
        return 0;
      }

      case "ask": {
        const question = args.join(" ").trim();
        if (!question) {
          io.stderr(`ask needs a question\n\n${USAGE}`);
          return 2;
        }
        const result = await answer(
          { question },
          {
            embeddingProvider: container.embeddingProvider,
            vectorStore: container.vectorStore,
            collectionName: config.ingestion.collectionName,
            defaultTopK: config.retrieval.topK,
            llm: container.llm(),
            systemPrompt: config.retrieval.systemPrompt,
            logger,
          },
        );
        io.stdout(result.answer);
        if (result.sources.length > 0) {
          io.stdout("\nSources:");
          result.sources.forEach((source, i) => {
            const page = source.metadata["page"] ? ` (page ${source.metadata["page"]})` : "";
            io.stdout(`  [${String(i + 1)}] ${source.metadata["source"] ?? "unknown"}${page}`);
          });
        }
        return 0;
      }

      case "models": {
        const llm = container.llm();
        const models = await llm.listModels();
        io.stdout(`${llm.name} (active: ${llm.model})`);
        for (const model of models) io.stdout(`  ${model}`);
        return 0;
      }
    }
  } catch (err) {
    const code = AppError.isAppError(err) ? ` [${err.code}]` : "";
    io.stderr(`Error${code}: ${errorMessage(err)}`);
    return 1;
  }
}
