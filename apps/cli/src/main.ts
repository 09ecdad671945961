import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { AppConfig, Message, Session } from "@sessionscope/contracts";
import {
  AdapterRegistry,
  DEFAULT_CONFIG_PATH,
  InvalidInputError,
  classifyModel,
  compareSessions,
  configInputFromRecord,
  isSessionScopeError,
  loadConfig,
  mergeConfig,
  modelCost,
  saveConfig,
  silentLogger,
  type CoreLogger,
  type SessionAdapter,
} from "@sessionscope/core";

const DEFAULT_SESSION_LIMIT = 50;
const PREVIEW_LENGTH = 80;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

type GlobalOptions = {
  config: string;
  verbose?: boolean;
};

interface CliContext {
  configPath: string;
  config: AppConfig;
  logger: CoreLogger;
  registry: AdapterRegistry;
}

function printTable(io: CliIO, rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ")
      .trimEnd();
    io.out(line);
    if (idx === 0) {
      io.out(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function fmtTime(ms: number | null): string {
  if (!ms) return "-";
  return new Date(ms).toISOString().replace(".000Z", "Z");
}

function fmtUsd(value: number): string {
  return `$${value.toFixed(4)}`;
}

function normalizeInlineText(value: string, max = PREVIEW_LENGTH): string {
  const flat = value.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/** Only keys that already exist in the config can be set. */
function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  const lastKey = parts.pop();
  if (!lastKey) throw new InvalidInputError("config key must not be empty");

  let cursor = target;
  for (const key of parts) {
    const next = cursor[key];
    if (!isRecord(next)) throw new InvalidInputError(`unknown config key ${dottedKey}`);
    cursor = next;
  }
  const current = cursor[lastKey];
  if (current === undefined || isRecord(current)) throw new InvalidInputError(`unknown config key ${dottedKey}`);
  if (typeof current !== typeof value) {
    throw new InvalidInputError(`config key ${dottedKey} expects a ${typeof current}`);
  }
  cursor[lastKey] = value;
}

function getPath(target: unknown, dottedKey: string): unknown {
  let cursor = target;
  for (const key of dottedKey.split(".").filter(Boolean)) {
    if (!isRecord(cursor) || !(key in cursor)) throw new InvalidInputError(`unknown config key ${dottedKey}`);
    cursor = cursor[key];
  }
  return cursor;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return parsed;
}

function parseTokenCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return parsed;
}

function stderrLogger(io: CliIO): CoreLogger {
  const write = (level: string, message: string, fields?: Record<string, unknown>): void => {
    io.err(fields ? `${level}: ${message} ${JSON.stringify(fields)}` : `${level}: ${message}`);
  };
  return {
    debug: (message, fields) => write("debug", message, fields),
    warn: (message, fields) => write("warn", message, fields),
  };
}

async function openContext(program: Command, io: CliIO): Promise<CliContext> {
  const opts = program.opts<GlobalOptions>();
  const logger = opts.verbose ? stderrLogger(io) : silentLogger;
  const config = await loadConfig(opts.config, logger);
  return {
    configPath: opts.config,
    config,
    logger,
    registry: AdapterRegistry.fromConfig(config, { logger }),
  };
}

function sessionRows(sessions: Session[]): string[][] {
  return [
    ["adapter", "id", "title", "msgs", "in", "out", "cost", "updated", "live"],
    ...sessions.map((session) => [
      `${session.adapterIcon} ${session.adapterId}`,
      session.id,
      normalizeInlineText(session.title, 40) || "-",
      String(session.messageCount),
      String(session.totalInputTokens),
      String(session.totalOutputTokens),
      fmtUsd(session.estCostUsd),
      fmtTime(session.lastUpdatedMs),
      session.isLive ? "yes" : "",
    ]),
  ];
}

function printMessages(io: CliIO, messages: Message[]): void {
  for (const [index, message] of messages.entries()) {
    const model = message.model ? ` ${message.model}` : "";
    io.out(`#${index} ${message.role} ${fmtTime(message.timestampMs)}${model}`);
    for (const block of message.thinkingBlocks) {
      io.out(`  (thinking) ${normalizeInlineText(block.content)}`);
    }
    if (message.content) io.out(message.content);
    for (const tool of message.toolUses) {
      const status = tool.isError ? " [error]" : "";
      io.out(`  -> ${tool.name}${status} ${normalizeInlineText(tool.input)}`);
      if (tool.output) io.out(`  <- ${normalizeInlineText(tool.output)}`);
    }
  }
}

export function buildProgram(io: CliIO = consoleIO): Command {
  const program = new Command();
  program
    .name("sessionscope")
    .description("Inspect coding-assistant session logs: sessions, transcripts, usage and cost")
    .option("--config <path>", "Config path", DEFAULT_CONFIG_PATH)
    .option("--verbose", "Log cache and parse diagnostics to stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  program
    .command("sessions [project]")
    .description("List sessions of a project across adapters, newest first")
    .option("--adapter <id>", "Only this adapter")
    .option("--limit <n>", "Rows to show", parsePositiveInt, DEFAULT_SESSION_LIMIT)
    .option("--json", "JSON output")
    .action(async (project: string | undefined, opts: { adapter?: string; limit: number; json?: boolean }) => {
      const { registry } = await openContext(program, io);
      const adapters: readonly SessionAdapter[] = opts.adapter ? [registry.require(opts.adapter)] : registry.list();
      const projectPath = project ?? process.cwd();
      const lists = await Promise.all(adapters.map((adapter) => adapter.sessions(projectPath)));
      const sessions = lists.flat().sort(compareSessions).slice(0, opts.limit);
      if (opts.json) {
        io.out(JSON.stringify(sessions, null, 2));
        return;
      }
      if (sessions.length === 0) {
        io.out(`no sessions for ${projectPath}`);
        return;
      }
      printTable(io, sessionRows(sessions));
    });

  program
    .command("messages <adapter> <sessionId>")
    .description("Print a session transcript")
    .option("--json", "JSON output")
    .action(async (adapterId: string, sessionId: string, opts: { json?: boolean }) => {
      const { registry } = await openContext(program, io);
      const messages = await registry.require(adapterId).messages(sessionId);
      if (opts.json) {
        io.out(JSON.stringify(messages, null, 2));
        return;
      }
      printMessages(io, messages);
    });

  program
    .command("usage <adapter> <sessionId>")
    .description("Token totals and estimated cost of a session")
    .option("--json", "JSON output")
    .action(async (adapterId: string, sessionId: string, opts: { json?: boolean }) => {
      const { registry } = await openContext(program, io);
      const usage = await registry.require(adapterId).usage(sessionId);
      if (opts.json) {
        io.out(JSON.stringify(usage, null, 2));
        return;
      }
      printTable(io, [
        ["field", "value"],
        ["messages", String(usage.messageCount)],
        ["input", String(usage.inputTokens)],
        ["output", String(usage.outputTokens)],
        ["cache_read", String(usage.cacheReadTokens)],
        ["cache_write", String(usage.cacheWriteTokens)],
        ["total", String(usage.totalTokens)],
        ["cost", fmtUsd(usage.estCostUsd)],
      ]);
    });

  program
    .command("search <adapter> <sessionId> <query>")
    .description("Search message text, tool calls, tool results and thinking")
    .option("--regex", "Treat the query as a regular expression")
    .option("--case-sensitive", "Match case")
    .option("--max <n>", "Maximum matches", parsePositiveInt)
    .action(
      async (
        adapterId: string,
        sessionId: string,
        query: string,
        opts: { regex?: boolean; caseSensitive?: boolean; max?: number },
      ) => {
        const { registry } = await openContext(program, io);
        const results = await registry.require(adapterId).searchMessages(sessionId, query, {
          regex: opts.regex ?? false,
          caseSensitive: opts.caseSensitive ?? false,
          ...(opts.max !== undefined ? { maxResults: opts.max } : {}),
        });
        if (results.length === 0) {
          io.out("no matches");
          return;
        }
        printTable(io, [
          ["msg", "role", "block", "line", "cols", "text"],
          ...results.flatMap((result) =>
            result.matches.map((match) => [
              `#${result.messageIndex}`,
              result.role,
              match.blockType,
              String(match.lineNo),
              `${match.colStart}-${match.colEnd}`,
              normalizeInlineText(match.line),
            ]),
          ),
        ]);
      },
    );

  program
    .command("detect [project]")
    .description("List adapters that have sessions for a project")
    .action(async (project: string | undefined) => {
      const { registry } = await openContext(program, io);
      const projectPath = project ?? process.cwd();
      const found = await registry.detect(projectPath);
      if (found.length === 0) {
        io.out(`no adapters detected for ${projectPath}`);
        return;
      }
      for (const adapter of found) {
        io.out(`${adapter.icon} ${adapter.id}\t${adapter.name}\t${adapter.root}`);
      }
    });

  program
    .command("cost <model>")
    .description("Estimate the cost of a token mix for a model")
    .option("--input <n>", "Uncached input tokens", parseTokenCount, 0)
    .option("--output <n>", "Output tokens", parseTokenCount, 0)
    .option("--cache-read <n>", "Cache-read tokens", parseTokenCount, 0)
    .option("--cache-write <n>", "Cache-write tokens", parseTokenCount, 0)
    .action((model: string, opts: { input: number; output: number; cacheRead: number; cacheWrite: number }) => {
      const tier = classifyModel(model);
      const cost = modelCost(model, {
        inputTokens: opts.input,
        outputTokens: opts.output,
        cacheReadTokens: opts.cacheRead,
        cacheWriteTokens: opts.cacheWrite,
      });
      io.out(`${model}\ttier=${tier.name}\tin=$${tier.inRate}/M\tout=$${tier.outRate}/M\tcost=${fmtUsd(cost)}`);
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd
    .command("get [key]")
    .description("Print the effective configuration or one dotted key")
    .action(async (key: string | undefined) => {
      const { config } = await openContext(program, io);
      const value = key ? getPath(config, key) : config;
      io.out(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
    });

  configCmd
    .command("set <key> <value>")
    .description("Set a dotted key, for example adapters.codex.root")
    .action(async (key: string, value: string) => {
      const { config, configPath } = await openContext(program, io);
      const mutable: Record<string, unknown> = { ...structuredClone(config) };
      setPath(mutable, key, parseValue(value));
      await saveConfig(mergeConfig(configInputFromRecord(mutable)), configPath);
      io.out(`updated ${key}`);
    });

  configCmd
    .command("path")
    .description("Print the config file path")
    .action(() => {
      io.out(program.opts<GlobalOptions>().config);
    });

  return program;
}

/** Runs one invocation and returns the process exit code; never throws. */
export async function runCli(args: string[], io: CliIO = consoleIO): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    const code = isSessionScopeError(error) ? error.code : "internal";
    const message = error instanceof Error ? error.message : String(error);
    io.err(`error[${code}]: ${message}`);
    return 1;
  }
}
