import { spawn } from "node:child_process";
import { ProcessAborted, ProcessTimeout } from "../errors.js";

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  // No deadline unless set; the child is killed when it passes
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface RunResult {
  exitCode: number;
  stdout: Buffer;
  stderr: Buffer;
}

export type CommandRunner = (command: string[], options?: RunOptions) => Promise<RunResult>;

/**
 * Spawns `command[0]` with the remaining entries as arguments (no shell),
 * buffers both output streams and resolves once the child exits.
 * A non-zero exit code is returned, not thrown; callers decide what it means.
 */
export const runExternal: CommandRunner = (command, options = {}) => {
  const [file, ...args] = command;
  if (!file) {
    return Promise.reject(new Error("runExternal requires a command"));
  }

  return new Promise<RunResult>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new ProcessAborted(file));
      return;
    }

    const child = spawn(file, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let failure: Error | null = null;
    let timer: NodeJS.Timeout | undefined;

    const kill = (reason: Error) => {
      if (failure) return;
      failure = reason;
      child.kill("SIGKILL");
    };
    const onAbort = () => kill(new ProcessAborted(file));

    if (options.timeoutMs && options.timeoutMs > 0) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => kill(new ProcessTimeout(file, timeoutMs)), timeoutMs);
    }
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const settle = () => {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    };

    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err) => {
      settle();
      reject(failure ?? err);
    });

    child.on("close", (code) => {
      settle();
      if (failure) {
        reject(failure);
        return;
      }
      resolve({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr),
      });
    });
  });
};
