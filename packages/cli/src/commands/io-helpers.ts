/**
 * Shared input/output helpers for CLI commands
 */

import { access, readFile } from "node:fs/promises";
import { text } from "node:stream/consumers";
import { type TraceEvent, type UDMNode, WeftError, fromJS } from "@weft/core";

const VARIABLE_NAME = /^[\p{L}_][\p{L}\p{N}_]*$/u;

/** Read a file, or stdin when no path is given */
export async function readInput(path?: string): Promise<string> {
  if (path && path !== "-") {
    return readFile(path, "utf8");
  }
  if (process.stdin.isTTY) {
    throw new Error("No input file given and nothing piped to stdin");
  }
  return text(process.stdin);
}

/**
 * Parse repeated `--var name=value` options. Values are JSON; anything that
 * is not valid JSON is taken as a plain string.
 */
export function parseVariables(entries: readonly string[] = []): Record<string, UDMNode> {
  const variables: Record<string, UDMNode> = {};

  for (const entry of entries) {
    const separator = entry.indexOf("=");
    if (separator <= 0) {
      throw new Error(`Invalid --var '${entry}': expected name=value`);
    }

    const name = entry.slice(0, separator).trim();
    if (!VARIABLE_NAME.test(name)) {
      throw new Error(`Invalid --var name '${name}'`);
    }

    const raw = entry.slice(separator + 1);
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      value = raw;
    }
    variables[name] = fromJS(value, { attributePrefix: "@" });
  }

  return variables;
}

/** Commander collector for repeatable options */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** One line per trace event */
export function formatTraceEvent(event: TraceEvent): string {
  switch (event.type) {
    case "run_started":
      return `run ${event.runId} started`;
    case "function_called":
      return `call ${event.name} (${event.origin}, ${event.argCount} arg${event.argCount === 1 ? "" : "s"}) at ${event.line}:${event.column}`;
    case "pipe_stage":
      return `pipe stage ${event.stage} at ${event.line}:${event.column}`;
    case "run_completed":
      return `run ${event.runId} completed in ${event.durationMs}ms`;
    case "run_failed":
      return `run ${event.runId} failed: [${event.code}] ${event.error}`;
  }
}

/** Formatted error text: source excerpt for script errors, message otherwise */
export function describeError(error: unknown): string {
  if (error instanceof WeftError) return error.format();
  return error instanceof Error ? error.message : String(error);
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
