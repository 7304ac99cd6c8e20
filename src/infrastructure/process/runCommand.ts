import { spawn } from "child_process";

export type CommandFailureKind = "not_found" | "exit" | "timeout" | "aborted" | "output_limit" | "spawn";

export class CommandError extends Error {
  readonly kind: CommandFailureKind;
  readonly command: string;
  readonly exitCode?: number | null;
  readonly stderr?: string;
  readonly cause?: unknown;

  constructor(args: {
    kind: CommandFailureKind;
    command: string;
    message: string;
    exitCode?: number | null;
    stderr?: string;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "CommandError";
    this.kind = args.kind;
    this.command = args.command;
    this.exitCode = args.exitCode;
    this.stderr = args.stderr;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type RunCommandOpts = {
  timeoutMs?: number;
  maxOutputBytes?: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
};

export type RunCommand = (cmd: string, args: string[], opts?: RunCommandOpts) => Promise<string>;

const STDERR_EXCERPT_CHARS = 500;

const errnoCode = (err: unknown): string | undefined => {
  if (typeof err !== "object" || err == null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
};

/**
 * Runs a command and resolves its trimmed stdout. Rejects with a CommandError
 * on a non-zero exit, a timeout, an abort, or when the binary cannot be spawned.
 */
export const runCommand: RunCommand = (cmd, args, opts = {}) => {
  const command = [cmd, ...args].join(" ");

  return new Promise<string>((resolve, reject) => {
    let settled = false;
    let timeout: NodeJS.Timeout | null = null;
    const finish = (err?: CommandError, value?: string) => {
      if (settled) return;
      settled = true;
      if (timeout) clearTimeout(timeout);
      if (err) reject(err);
      else resolve(value ?? "");
    };

    if (opts.signal?.aborted) {
      finish(new CommandError({ kind: "aborted", command, message: `${cmd} aborted before start` }));
      return;
    }

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let stdoutBytes = 0;

    const child = spawn(cmd, args, {
      env: opts.env,
      stdio: ["ignore", "pipe", "pipe"],
      signal: opts.signal
    });

    if (opts.timeoutMs) {
      const timeoutMs = opts.timeoutMs;
      timeout = setTimeout(() => {
        child.kill("SIGTERM");
        finish(new CommandError({ kind: "timeout", command, message: `${cmd} timed out after ${timeoutMs}ms` }));
      }, timeoutMs);
    }

    child.stdout?.on("data", (buf: Buffer) => {
      if (opts.maxOutputBytes) {
        stdoutBytes += buf.length;
        if (stdoutBytes > opts.maxOutputBytes) {
          child.kill("SIGTERM");
          finish(new CommandError({
            kind: "output_limit",
            command,
            message: `${cmd} output exceeded ${opts.maxOutputBytes} bytes`
          }));
          return;
        }
      }
      stdout.push(buf);
    });
    child.stderr?.on("data", (buf: Buffer) => {
      stderr.push(buf);
    });

    child.on("error", (err) => {
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "EACCES") {
        finish(new CommandError({ kind: "not_found", command, message: `${cmd} could not be executed (${code})`, cause: err }));
        return;
      }
      if (opts.signal?.aborted) {
        finish(new CommandError({ kind: "aborted", command, message: `${cmd} aborted`, cause: err }));
        return;
      }
      finish(new CommandError({ kind: "spawn", command, message: `${cmd} failed: ${err.message}`, cause: err }));
    });

    child.on("close", (exitCode) => {
      if (exitCode === 0) {
        finish(undefined, Buffer.concat(stdout).toString("utf8").trim());
        return;
      }
      const stderrText = Buffer.concat(stderr).toString("utf8").trim().slice(0, STDERR_EXCERPT_CHARS);
      finish(new CommandError({
        kind: "exit",
        command,
        exitCode,
        stderr: stderrText,
        message: stderrText
          ? `${cmd} exited with code ${exitCode ?? "null"}: ${stderrText}`
          : `${cmd} exited with code ${exitCode ?? "null"}`
      }));
    });
  });
};
