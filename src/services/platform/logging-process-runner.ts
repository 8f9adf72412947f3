/**
 * ProcessRunner decorator that records every external command in the log.
 *
 * Spawns and captured output go to debug. Kills, timeouts and spawn failures
 * are warnings or errors. Exit and timeout entries carry the elapsed time, since
 * package installs can run for many minutes.
 */

import type { ProcessRunner, ProcessResult, ProcessOptions, SpawnedProcess } from "./process";
import type { Logger } from "../logging";

export class LoggingProcessRunner implements ProcessRunner {
  constructor(
    private readonly inner: ProcessRunner,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const startedAt = this.now();
    const proc = this.inner.run(command, args, options);
    const pid = proc.pid;

    // Without a PID the spawn failed; the reason arrives with wait()
    if (pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid });
    }

    let reported = false;
    return {
      pid,
      kill: (signal?: NodeJS.Signals): boolean => {
        const killed = proc.kill(signal);
        if (killed) {
          this.logger.warn("Killed", { command, pid: pid ?? 0, signal: signal ?? "SIGTERM" });
        }
        return killed;
      },
      wait: async (timeout?: number): Promise<ProcessResult> => {
        const result = await proc.wait(timeout);
        if (result.running) {
          this.logger.warn("Wait timeout", { command, pid: pid ?? 0, timeout: timeout ?? 0 });
        } else if (!reported) {
          reported = true;
          this.report(command, pid, result, this.now() - startedAt);
        }
        return result;
      },
    };
  }

  private report(
    command: string,
    pid: number | undefined,
    result: ProcessResult,
    elapsedMs: number
  ): void {
    if (pid === undefined) {
      this.logger.error("Spawn failed", { command, error: result.stderr || "Unknown error" });
      return;
    }

    const prefix = `[${command} ${pid}]`;
    for (const [stream, output] of [
      ["stdout", result.stdout],
      ["stderr", result.stderr],
    ] as const) {
      for (const line of output.split("\n")) {
        if (line.trim() !== "") this.logger.debug(`${prefix} ${stream}: ${line}`);
      }
    }

    if (result.timedOut) {
      this.logger.warn("Timed out", { command, pid, elapsedMs });
    } else if (result.signal) {
      this.logger.warn("Killed", { command, pid, signal: result.signal });
    } else {
      this.logger.debug("Exited", { command, pid, exitCode: result.exitCode ?? -1, elapsedMs });
    }
  }
}
