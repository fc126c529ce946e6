import { readFileSync } from "fs";
import { runPipeline } from "./pipeline.ts";
import { DEFAULT_REQUIRED_PATHS } from "./fields.ts";
import { describeError } from "./errors.ts";
import { logger } from "./utils/logger.ts";

export const USAGE =
  "Usage: need-analysis --content <text> [--source-type url|pdf|docx|text] [--payload <file.json>]";

export class CliUsageError extends Error {
  readonly code = "CLI_USAGE";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface CliOptions {
  content: string;
  sourceType: string;
  payloadPath: string | null;
  help: boolean;
}

export interface CliOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// ── Argument parsing ─────────────────────────────────────────────────

const VALUE_FLAGS = ["--content", "--source-type", "--payload"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

const VALUE_FLAG_SET: ReadonlySet<string> = new Set(VALUE_FLAGS);

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAG_SET.has(arg);
}

/** Accepts `--flag value` and `--flag=value`. */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const values: Partial<Record<ValueFlag, string>> = {};
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    if (!isValueFlag(flag)) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new CliUsageError(`Option ${flag} needs a value`);
    }
    values[flag] = value;
  }

  if (help) {
    return { content: "", sourceType: "text", payloadPath: null, help };
  }

  const content = values["--content"];
  if (content === undefined || !content.trim()) {
    throw new CliUsageError("--content is required");
  }

  return {
    content,
    sourceType: values["--source-type"] ?? "text",
    payloadPath: values["--payload"] ?? null,
    help,
  };
}

// ── Payload ──────────────────────────────────────────────────────────

/**
 * Required paths from a payload file: a JSON array, or an object with a
 * `required` array. Whatever the file holds goes to the validator as-is,
 * so a malformed list surfaces as the pipeline's `error`.
 */
export function loadRequiredPaths(payloadPath: string | null): unknown {
  if (payloadPath === null) return DEFAULT_REQUIRED_PATHS;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(payloadPath, "utf-8"));
  } catch (err) {
    throw new CliUsageError(`Cannot read payload ${payloadPath}: ${describeError(err)}`);
  }

  if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed) && "required" in parsed) {
    return parsed.required;
  }
  return parsed;
}

// ── Entry ────────────────────────────────────────────────────────────

/** Runs the CLI without touching process state, so tests can call it directly. */
export function runCli(args: readonly string[]): CliOutcome {
  let options: CliOptions;
  let requiredPaths: unknown;
  try {
    options = parseCliArgs(args);
    if (options.help) {
      return { exitCode: 0, stdout: `${USAGE}\n`, stderr: "" };
    }
    requiredPaths = loadRequiredPaths(options.payloadPath);
  } catch (err) {
    if (err instanceof CliUsageError) {
      return { exitCode: 2, stdout: "", stderr: `${err.message}\n${USAGE}\n` };
    }
    throw err;
  }

  logger.debug(`CLI run: source type ${options.sourceType}`);
  const result = runPipeline(
    { source_type: options.sourceType, content: options.content },
    requiredPaths
  );
  return { exitCode: 0, stdout: `${JSON.stringify(result, null, 2)}\n`, stderr: "" };
}
