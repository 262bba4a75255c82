/**
 * External process runner for shelling extractors.
 *
 * Runs a command to completion and captures both output streams. Stdout and
 * stderr are drained while the child is still running and the result is
 * only produced on `close`, once both pipes have ended and the process has
 * exited. A child writing more than the OS pipe buffer therefore never
 * blocks waiting for a reader.
 *
 * @module extraction/shell/ShellRunner
 */

import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { createLazyLogger } from "../../logging/index.js";
import { ExtractionError, MissingToolError, ShellError } from "../errors.js";
import type { Command, CommandRunner, ProcessResult, TempFileOptions } from "../types.js";

const getLogger = createLazyLogger("extraction:shell");

/**
 * Options for constructing a ShellRunner.
 */
export interface ShellRunnerOptions {
  /**
   * Working directory for spawned commands.
   *
   * @default process.cwd()
   */
  cwd?: string;

  /**
   * Shell used for string commands.
   *
   * @default "/bin/sh"
   */
  shell?: string;

  /**
   * Extra environment variables merged over the parent environment.
   */
  env?: Readonly<Record<string, string>>;
}

/**
 * Render a command for error messages and logs.
 */
export function formatCommand(command: Command): string {
  if (typeof command === "string") {
    return command;
  }
  return command.map((arg) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : JSON.stringify(arg))).join(" ");
}

/**
 * Exit code for a child terminated by a signal, following the shell's
 * 128 + signal number convention.
 */
function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}

/**
 * Runs external commands with captured output.
 *
 * @example
 * ```typescript
 * const runner = new ShellRunner();
 *
 * const { stdout } = await runner.run(["pdftotext", "-layout", "report.pdf", "-"]);
 * console.log(stdout.toString("utf8"));
 * ```
 */
export class ShellRunner implements CommandRunner {
  private readonly options: ShellRunnerOptions;

  constructor(options?: ShellRunnerOptions) {
    this.options = options ?? {};
  }

  /**
   * Run a command to completion.
   *
   * @param command - Argument array (run directly) or string (run through the shell)
   * @returns Captured stdout, stderr and exit code
   * @throws {ShellError} If the command exits non-zero or is killed by a signal
   * @throws {MissingToolError} If the program cannot be started
   */
  async run(command: Command): Promise<ProcessResult> {
    const rendered = formatCommand(command);
    const startTime = performance.now();

    getLogger().debug(
      { command: typeof command === "string" ? command : [...command] },
      "Running command"
    );

    const child = this.spawnChild(command);
    const program = typeof command === "string" ? this.shell : (command[0] ?? "");

    const result = await new Promise<ProcessResult>((resolve, reject) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;

      const onStreamError = (error: Error): void => {
        if (settled) return;
        settled = true;
        reject(new ExtractionError(`Failed to read output of ${rendered}`, { cause: error }));
      };

      child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));
      child.stdout?.on("error", onStreamError);
      child.stderr?.on("error", onStreamError);

      child.on("error", (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        if (error.code === "ENOENT" || error.code === "EACCES") {
          reject(new MissingToolError(program, { cause: error }));
          return;
        }
        reject(error);
      });

      child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        const exitCode = code ?? (signal ? signalExitCode(signal) : 1);
        resolve(
          Object.freeze({
            stdout: Buffer.concat(stdoutChunks),
            stderr: Buffer.concat(stderrChunks),
            exitCode,
          })
        );
      });
    });

    const durationMs = Math.round(performance.now() - startTime);

    if (result.exitCode !== 0) {
      getLogger().debug(
        { command: rendered, exitCode: result.exitCode, duration_ms: durationMs },
        "Command failed"
      );
      throw new ShellError(rendered, result.exitCode, result.stdout, result.stderr);
    }

    getLogger().debug(
      {
        command: rendered,
        exitCode: result.exitCode,
        stdoutBytes: result.stdout.length,
        duration_ms: durationMs,
      },
      "Command completed"
    );

    return result;
  }

  /**
   * Hand `fn` a scratch file path and remove it however `fn` settles.
   *
   * The path lives inside a fresh private directory, so tools that derive
   * sibling names from it (e.g. tesseract appending ".txt") are cleaned up
   * together with it.
   *
   * @example
   * ```typescript
   * const text = await runner.withTempFile(async (base) => {
   *   await runner.run(["tesseract", imagePath, base]);
   *   return fs.readFile(`${base}.txt`);
   * });
   * ```
   */
  async withTempFile<T>(
    fn: (tempPath: string) => Promise<T>,
    options?: TempFileOptions
  ): Promise<T> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), options?.prefix ?? "textsift-"));
    const tempPath = path.join(dir, `scratch${options?.extension ?? ""}`);

    try {
      return await fn(tempPath);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
      getLogger().trace({ dir }, "Removed scratch directory");
    }
  }

  private get shell(): string {
    return this.options.shell ?? "/bin/sh";
  }

  protected spawnChild(command: Command): ChildProcess {
    const env = this.options.env ? { ...process.env, ...this.options.env } : process.env;
    const spawnOptions: SpawnOptions = {
      cwd: this.options.cwd,
      env,
      stdio: ["ignore", "pipe", "pipe"],
    };

    if (typeof command === "string") {
      return spawn(this.shell, ["-c", command], spawnOptions);
    }

    const [program, ...args] = command;
    if (program === undefined) {
      throw new ExtractionError("Cannot run an empty command");
    }
    return spawn(program, args, spawnOptions);
  }
}
