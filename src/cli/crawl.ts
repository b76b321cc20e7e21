#!/usr/bin/env node
import { parseArgs } from "node:util";
import { type ExecutionMode, isExecutionMode, type RunSummary } from "../application/run-sources/runSources.usecase";
import { isSourceName, runCrawl, type SourceName, sourceNames } from "../composition/root";

type ErrorContext = Partial<{
  source: string;
  partition: string;
  cursor: string;
  status: number;
}>;

type CliErrorEnvelope = {
  event: "crawl.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

export type CrawlArgs = {
  sources: SourceName[];
  mode: ExecutionMode;
  fresh: boolean;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of ["source", "partition", "cursor"] as const) {
    const raw = value[key];
    if (typeof raw === "string") {
      sanitizedContext[key] = raw;
    }
  }
  if (typeof value.status === "number" && Number.isFinite(value.status)) {
    sanitizedContext.status = value.status;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "crawl.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const parseCrawlArgs = (argv: string[]): CrawlArgs => {
  const { values, positionals } = parseArgs({
    args: argv,
    options: { fresh: { type: "boolean", default: false } },
    allowPositionals: true,
    strict: true
  });

  const sources: SourceName[] = [];
  let mode: ExecutionMode = "parallel";
  for (const arg of positionals) {
    const name = arg.toLowerCase();
    if (isExecutionMode(name)) {
      mode = name;
    } else if (isSourceName(name)) {
      if (!sources.includes(name)) sources.push(name);
    } else {
      throw new Error(`Unknown source "${arg}". Known sources: ${sourceNames.join(", ")}`);
    }
  }

  return { sources, mode, fresh: values.fresh === true };
};

export const formatSummaryLines = (summary: RunSummary): string[] =>
  Object.entries(summary).map(([source, report]) => {
    const { completed, total, failed, truncated } = report.partitions;
    const line = `${source}: ${report.status}, ${report.totalRecords} new records, ${completed}/${total} partitions complete`;
    const extras = [failed > 0 ? `${failed} failed` : "", truncated > 0 ? `${truncated} truncated` : ""].filter(Boolean);
    const error = report.error ? ` (${report.error.code}: ${report.error.message})` : "";
    return `${line}${extras.length > 0 ? `, ${extras.join(", ")}` : ""}${error}`;
  });

export const executeCrawlCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const args = parseCrawlArgs(argv);
    const summary = await runCrawl({ ...args, signal: controller.signal });
    for (const line of formatSummaryLines(summary)) {
      // eslint-disable-next-line no-console
      console.log(line);
    }
    if (Object.values(summary).some((report) => report.status === "failed")) {
      process.exitCode = 1;
    }
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  }
};

if (require.main === module) {
  void executeCrawlCli();
}
