/**
 * Fake Command Runner
 *
 * In-process stand-in for ShellRunner. Records every command and answers
 * from a handler, so extractors that shell out can be tested without the
 * external tools installed.
 *
 * @module tests/helpers/fake-runner
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type {
  Command,
  CommandRunner,
  ProcessResult,
  TempFileOptions,
} from "../../src/extraction/types.js";

/**
 * Handler deciding the outcome of one command. Throw to simulate a failure.
 */
export type CommandHandler = (args: readonly string[]) => Promise<Partial<ProcessResult>>;

/**
 * Fake runner with call recording
 */
export class FakeCommandRunner implements CommandRunner {
  public readonly commands: string[][] = [];
  public readonly tempPaths: string[] = [];

  constructor(private readonly handler: CommandHandler = async () => ({})) {}

  async run(command: Command): Promise<ProcessResult> {
    const args = typeof command === "string" ? ["/bin/sh", "-c", command] : [...command];
    this.commands.push(args);
    const result = await this.handler(args);
    return {
      stdout: result.stdout ?? Buffer.alloc(0),
      stderr: result.stderr ?? Buffer.alloc(0),
      exitCode: result.exitCode ?? 0,
    };
  }

  async withTempFile<T>(
    fn: (tempPath: string) => Promise<T>,
    options?: TempFileOptions
  ): Promise<T> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), options?.prefix ?? "textsift-fake-"));
    const tempPath = path.join(dir, `scratch${options?.extension ?? ""}`);
    this.tempPaths.push(tempPath);
    try {
      return await fn(tempPath);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

/**
 * Create a fake runner that answers every command with `stdout`
 */
export function createStdoutRunner(stdout: string | Buffer): FakeCommandRunner {
  const bytes = typeof stdout === "string" ? Buffer.from(stdout, "utf8") : stdout;
  return new FakeCommandRunner(async () => ({ stdout: bytes }));
}
