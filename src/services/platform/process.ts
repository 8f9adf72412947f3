/**
 * Process spawning abstraction.
 *
 * Every external tool (package manager, editor CLI, command lookup) is invoked
 * through ProcessRunner so tests can substitute a mock and assert on the
 * arguments. ExecaProcessRunner is the production implementation.
 */

import { execa, ExecaError, type Options as ExecaOptions, type ResultPromise } from "execa";

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
  /** Environment variables */
  readonly env?: NodeJS.ProcessEnv;
  /** Kill the process after this many milliseconds */
  readonly timeout?: number;
  /** Run through the system shell (needed for .cmd shims on Windows) */
  readonly shell?: boolean;
}

/**
 * Outcome of a finished (or still running) process.
 */
export interface ProcessResult {
  /** Exit code, null when killed by signal or never spawned */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  /** Signal that terminated the process */
  readonly signal?: string;
  /** True when wait() returned because its own timeout elapsed */
  readonly running?: boolean;
  /** True when the process was killed for exceeding ProcessOptions.timeout */
  readonly timedOut?: boolean;
}

/**
 * Handle to a spawned process.
 */
export interface SpawnedProcess {
  /** Undefined when the process failed to spawn */
  readonly pid: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
  /**
   * Wait for the process to finish. Never rejects: spawn failures are
   * reported with exitCode null and the error message in stderr.
   *
   * @param timeout Stop waiting after this many milliseconds (process keeps running)
   */
  wait(timeout?: number): Promise<ProcessResult>;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess;
}

function toText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * ProcessRunner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  run(command: string, args: readonly string[], options: ProcessOptions = {}): SpawnedProcess {
    const execaOptions: ExecaOptions = {
      cleanup: true,
      cwd: options.cwd,
      env: options.env,
      timeout: options.timeout,
      shell: options.shell ?? false,
      encoding: "utf8",
      // Installers must never block on a prompt
      stdin: "ignore",
    };
    return new ExecaSpawnedProcess(execa(command, [...args], execaOptions));
  }
}

class ExecaSpawnedProcess implements SpawnedProcess {
  private readonly result: Promise<ProcessResult>;

  constructor(private readonly subprocess: ResultPromise) {
    this.result = subprocess.then(
      (done): ProcessResult => ({
        exitCode: done.exitCode ?? 0,
        stdout: toText(done.stdout),
        stderr: toText(done.stderr),
      }),
      (error: unknown): ProcessResult => {
        if (error instanceof ExecaError) {
          return {
            exitCode: error.exitCode ?? null,
            stdout: toText(error.stdout),
            stderr: toText(error.stderr) || error.shortMessage,
            ...(error.signal !== undefined && { signal: error.signal }),
            timedOut: error.timedOut,
          };
        }
        return {
          exitCode: null,
          stdout: "",
          stderr: error instanceof Error ? error.message : String(error),
        };
      }
    );
  }

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  kill(signal?: NodeJS.Signals): boolean {
    return this.subprocess.kill(signal);
  }

  async wait(timeout?: number): Promise<ProcessResult> {
    if (timeout === undefined) {
      return this.result;
    }

    let timer: NodeJS.Timeout | undefined;
    const elapsed = new Promise<ProcessResult>((resolve) => {
      timer = setTimeout(
        () => resolve({ exitCode: null, stdout: "", stderr: "", running: true }),
        timeout
      );
    });

    try {
      return await Promise.race([this.result, elapsed]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Result of running an external command to completion.
 */
export interface CommandOutcome {
  readonly ok: boolean;
  readonly exitCode: number | null;
  /** Failure description, present when ok is false */
  readonly error?: string;
}

/**
 * Summarize a ProcessResult as a CommandOutcome.
 */
export function toCommandOutcome(result: ProcessResult): CommandOutcome {
  if (result.running) {
    return { ok: false, exitCode: null, error: "still running after wait timeout" };
  }
  if (result.timedOut) {
    return { ok: false, exitCode: result.exitCode, error: "timed out" };
  }
  if (result.exitCode === 0) {
    return { ok: true, exitCode: 0 };
  }
  if (result.exitCode === null) {
    const reason = result.signal
      ? `killed by ${result.signal}`
      : result.stderr.trim() || "failed to start";
    return { ok: false, exitCode: null, error: reason };
  }
  const detail = lastLine(result.stderr) ?? lastLine(result.stdout);
  return {
    ok: false,
    exitCode: result.exitCode,
    error: detail
      ? `exited with code ${result.exitCode}: ${detail}`
      : `exited with code ${result.exitCode}`,
  };
}

function lastLine(output: string): string | undefined {
  const lines = output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");
  return lines[lines.length - 1];
}

/**
 * Run a command and wait for it to finish.
 */
export async function runCommand(
  runner: ProcessRunner,
  command: string,
  args: readonly string[],
  options?: ProcessOptions
): Promise<CommandOutcome> {
  const result = await runner.run(command, args, options).wait();
  return toCommandOutcome(result);
}
