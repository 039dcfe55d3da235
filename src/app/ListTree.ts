import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { DEFAULT_NAME_PATTERN, MAX_DEPTH } from "@/constants";
import {
  type DepthLimitedWalker,
  DepthLimitedWalkerDefault,
  type WalkEntry,
} from "@/services/DepthLimitedWalker";
import { DirectoryListerDefault } from "@/services/DirectoryLister";
import {
  type RootNotFoundError,
  type RootResolver,
  RootResolverDefault,
} from "@/services/RootResolver";
import type {
  CaseMode,
  FilterCriteria,
  OutputFormat,
  RootSpecification,
} from "@/types";
import { expandHome } from "@/utils/helper";

const listTreeArgsSchema = t.Object({
  path: t.Optional(t.String({ minLength: 1 })),
  literalPath: t.Optional(t.String({ minLength: 1 })),
  filter: t.String({ minLength: 1, default: DEFAULT_NAME_PATTERN }),
  depth: t.Integer({ minimum: 0, maximum: MAX_DEPTH }),
  file: t.Boolean({ default: false }),
  case: t.Union(
    [t.Literal("host"), t.Literal("sensitive"), t.Literal("insensitive")],
    { default: "host" }
  ),
  format: t.Union([t.Literal("path"), t.Literal("json")], {
    default: "path",
  }),
  verbose: t.Boolean({ default: false }),
});

export type ListTreeRequest = {
  spec: RootSpecification;
  depth: number;
  filter: FilterCriteria;
  format: OutputFormat;
  verbose: boolean;
};

export type ArgumentError = {
  type: "ARGUMENT_INVALID";
  message: string;
};

export type ListTreeSummary = {
  roots: number;
  entries: number;
};

export type ListTreeDeps = {
  resolver: RootResolver;
  walker: DepthLimitedWalker;
  write: (line: string) => void;
  logger: Logger;
};

const textOptionKeys = ["path", "literalPath", "filter"] as const;

function kebabCase(key: string) {
  return key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

function optionName(pointer: string) {
  const key = pointer.replace(/^\//, "").split("/")[0] ?? "";
  return `--${kebabCase(key)}`;
}

/**
 * cac 會把看起來像數字的值轉成 number（`2024.10` → `2024.1`），
 * 路徑與篩選參數改從原始參數讀取。同一選項出現多次時取最後一個。
 */
export function readRawOption(rawArgs: readonly string[], key: string) {
  const flags = new Set([`--${key}`, `--${kebabCase(key)}`]);
  let found: string | undefined;
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if (arg === "--") break;
    if (flags.has(arg) && i + 1 < rawArgs.length) {
      found = rawArgs[++i];
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq > 0 && flags.has(arg.slice(0, eq))) found = arg.slice(eq + 1);
  }
  return found;
}

/** --verbose 只會把等級調高到 debug，不會蓋掉更詳細的設定 */
export function withVerbose(logger: Logger, verbose: boolean) {
  if (!verbose || logger.isLevelEnabled("debug")) return logger;
  return logger.withLevel("debug");
}

function caseSensitivity(mode: CaseMode) {
  if (mode === "host") return undefined;
  return mode === "sensitive";
}

export function parseListTreeArgs(
  positional: unknown,
  raw: Record<string, unknown>,
  rawArgs: readonly string[] = []
): Result<ListTreeRequest, ArgumentError> {
  if (positional !== undefined && raw.path !== undefined) {
    return err({
      type: "ARGUMENT_INVALID",
      message: "Path was given both as an argument and as --path",
    });
  }

  const merged: Record<string, unknown> = {
    ...raw,
    path: raw.path ?? positional,
  };
  for (const key of textOptionKeys) {
    if (raw[key] === undefined) continue;
    merged[key] = readRawOption(rawArgs, key) ?? raw[key];
  }

  const input: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(merged)) {
    if (value !== undefined) input[key] = value;
  }

  const candidate = Value.Default(
    listTreeArgsSchema,
    Value.Clean(listTreeArgsSchema, input)
  );
  if (!Value.Check(listTreeArgsSchema, candidate)) {
    const first = Value.Errors(listTreeArgsSchema, candidate).First();
    return err({
      type: "ARGUMENT_INVALID",
      message: first
        ? `Invalid option ${optionName(first.path)}: ${first.message}`
        : "Invalid options",
    });
  }
  const args = candidate;

  if (args.path !== undefined && args.literalPath !== undefined) {
    return err({
      type: "ARGUMENT_INVALID",
      message: "Path and LiteralPath are mutually exclusive",
    });
  }

  let spec: RootSpecification;
  if (args.path !== undefined) {
    spec = { kind: "pattern", text: expandHome(args.path) };
  } else if (args.literalPath !== undefined) {
    spec = { kind: "literal", text: args.literalPath };
  } else {
    return err({
      type: "ARGUMENT_INVALID",
      message: "One of Path or LiteralPath is required",
    });
  }

  return ok({
    spec,
    depth: args.depth,
    filter: {
      namePattern: args.filter,
      entriesOnly: args.file,
      caseSensitive: caseSensitivity(args.case),
    },
    format: args.format,
    verbose: args.verbose,
  });
}

function entryType(entry: WalkEntry) {
  if (entry.isSymbolicLink) return "symlink";
  return entry.isDirectory ? "directory" : "file";
}

export function formatEntry(entry: WalkEntry, format: OutputFormat) {
  if (format === "path") return entry.path;
  return JSON.stringify({
    name: entry.name,
    path: entry.path,
    type: entryType(entry),
    depth: entry.depth,
  });
}

export async function runListTree(
  request: ListTreeRequest,
  deps: ListTreeDeps
): Promise<Result<ListTreeSummary, RootNotFoundError>> {
  const resolved = await deps.resolver.resolve(request.spec);
  if (isErr(resolved)) return resolved;

  const roots = resolved.value;
  let entries = 0;
  for (const root of roots) {
    deps.logger.debug({ event: "start", root: root.path })`開始列出 ${root.path}`;
    const walk = deps.walker.walk(root, {
      depth: request.depth,
      filter: request.filter,
    });
    for await (const entry of walk) {
      deps.write(formatEntry(entry, request.format));
      entries++;
    }
  }

  deps.logger.debug({ event: "done", roots: roots.length, entries })`完成`;
  return ok({ roots: roots.length, entries });
}

export function registerListTree(cli: CAC, baseLogger: Logger) {
  cli
    .command("[path]", "列出路徑下的項目，可限制深度、名稱與類型")
    .option("--path <pattern>", "根目錄（可含萬用字元，會展開成多個根目錄）")
    .option("--literal-path <path>", "根目錄（照字面比對，不展開萬用字元）")
    .option("--filter <glob>", "名稱篩選", { default: DEFAULT_NAME_PATTERN })
    .option("--depth <n>", `最多往下列出的層數（0-${MAX_DEPTH}）`)
    .option("--file", "只輸出檔案，不輸出資料夾")
    .option("--case <mode>", "名稱比對大小寫：host | sensitive | insensitive", {
      default: "host",
    })
    .option("--format <format>", "輸出格式：path | json", { default: "path" })
    .option("--verbose", "輸出除錯訊息（包含因深度限制略過的資料夾）")
    .example("depthwalk ./src --depth 1 --filter '*.ts' --file")
    .example("depthwalk --literal-path './[draft]' --depth 0")
    .action(async (positional: unknown, options: Record<string, unknown>) => {
      const logger = baseLogger.extend("list");

      const parsed = parseListTreeArgs(positional, options, cli.rawArgs);
      if (isErr(parsed)) {
        logger.error(parsed.error.message);
        process.exitCode = 2;
        return;
      }
      const request = parsed.value;
      const runLogger = withVerbose(logger, request.verbose);

      const result = await runListTree(request, {
        resolver: new RootResolverDefault(),
        walker: new DepthLimitedWalkerDefault(
          new DirectoryListerDefault(),
          runLogger
        ),
        write: (line) => process.stdout.write(`${line}\n`),
        logger: runLogger,
      });
      if (isErr(result)) {
        logger.error({ spec: result.error.spec }, result.error.message);
        process.exitCode = 1;
      }
    });
}
