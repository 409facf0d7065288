/**
 * External command invocation.
 */

import { spawn } from "node:child_process";
import { isAbsolute, resolve } from "node:path";
import type { CommandSpec } from "../types/index.js";

/** Bytes of combined output kept from a child process */
export const OUTPUT_LIMIT_BYTES = 64 * 1024;

const PLACEHOLDER = /\{(input|output):([A-Za-z0-9_.-]+)\}/g;

export type PlaceholderRole = "input" | "output";

export interface Placeholder {
  readonly role: PlaceholderRole;
  readonly name: string;
}

export interface PlaceholderBindings {
  readonly inputs: ReadonlyMap<string, string>;
  readonly outputs: ReadonlyMap<string, string>;
}

export interface ResolvedCommand {
  readonly program: string;
  readonly args: readonly string[];
  readonly cwd: string;
}

export interface CommandResult {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly output: string;
  /** Set when the process could not be started */
  readonly error?: Error;
}

export class UnboundPlaceholderError extends Error {
  constructor(public readonly placeholder: Placeholder) {
    super(`No ${placeholder.role} named "${placeholder.name}"`);
    this.name = "UnboundPlaceholderError";
  }
}

/**
 * Placeholders referenced by an argument.
 */
export function findPlaceholders(arg: string): Placeholder[] {
  return [...arg.matchAll(PLACEHOLDER)].map((match) => ({
    role: match[1] === "input" ? "input" : "output",
    name: match[2] ?? "",
  }));
}

/**
 * Bind placeholders to concrete paths and resolve the working directory
 * against `root`.
 *
 * @throws UnboundPlaceholderError for a name with no binding
 */
export function resolveCommand(
  command: CommandSpec,
  bindings: PlaceholderBindings,
  root: string
): ResolvedCommand {
  const args = command.args.map((arg) =>
    arg.replace(PLACEHOLDER, (_match, role: string, name: string) => {
      const table = role === "input" ? bindings.inputs : bindings.outputs;
      const path = table.get(name);
      if (path === undefined) {
        throw new UnboundPlaceholderError({ role: role === "input" ? "input" : "output", name });
      }
      return path;
    })
  );

  const cwd =
    command.cwd === undefined
      ? root
      : isAbsolute(command.cwd)
        ? command.cwd
        : resolve(root, command.cwd);

  return { program: command.program, args, cwd };
}

/**
 * Render a command for logs and error messages.
 */
export function formatCommand(command: Pick<ResolvedCommand, "program" | "args">): string {
  return [command.program, ...command.args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}

/**
 * Run a command to completion, keeping the tail of its output.
 * Resolves for every outcome; the caller decides what a failure means.
 */
export function runCommand(
  command: ResolvedCommand,
  outputLimit: number = OUTPUT_LIMIT_BYTES
): Promise<CommandResult> {
  return new Promise((resolvePromise) => {
    let output = Buffer.alloc(0);
    let settled = false;

    const collect = (chunk: Buffer): void => {
      output = Buffer.concat([output, chunk]);
      if (output.length > outputLimit) {
        output = output.subarray(output.length - outputLimit);
      }
    };

    const settle = (result: CommandResult): void => {
      if (!settled) {
        settled = true;
        resolvePromise(result);
      }
    };

    const child = spawn(command.program, [...command.args], {
      cwd: command.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    child.stdout.on("data", collect);
    child.stderr.on("data", collect);

    child.on("error", (error) => {
      settle({ exitCode: null, signal: null, output: output.toString("utf-8"), error });
    });

    child.on("close", (exitCode, signal) => {
      settle({ exitCode, signal, output: output.toString("utf-8") });
    });
  });
}
