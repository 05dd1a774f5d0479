import { spawn } from "child_process";

export interface RunResult {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs?: number;
}

export class ProcessError extends Error {
  readonly code: number | null;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(
    bin: string,
    code: number | null,
    stderr: string,
    timedOut: boolean,
  ) {
    const reason = timedOut ? "timed out" : `exited with code ${code}`;
    const tail = stderr.trim().split("\n").slice(-5).join("\n");
    super(tail.length > 0 ? `${bin} ${reason}: ${tail}` : `${bin} ${reason}`);
    this.name = "ProcessError";
    this.code = code;
    this.stderr = stderr;
    this.timedOut = timedOut;
  }
}

export function run(
  bin: string,
  args: string[],
  options: RunOptions = {},
): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const p = spawn(bin, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });
    let out = "";
    let err = "";
    let timedOut = false;
    let timer: NodeJS.Timeout | null = null;

    if (options.timeoutMs && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        p.kill("SIGKILL");
      }, options.timeoutMs);
    }

    p.stdout.on("data", (d: Buffer) => (out += d.toString()));
    p.stderr.on("data", (d: Buffer) => (err += d.toString()));
    p.on("error", (e) => {
      if (timer) {
        clearTimeout(timer);
      }
      reject(e);
    });
    p.on("close", (code) => {
      if (timer) {
        clearTimeout(timer);
      }
      if (code === 0 && !timedOut) {
        resolve({ stdout: out, stderr: err });
        return;
      }
      reject(new ProcessError(bin, code, err || out, timedOut));
    });
  });
}

/** Resolves when `bin <probeArg>` can be spawned and exits cleanly. */
export async function isExecutable(bin: string, probeArg = "--version"): Promise<boolean> {
  try {
    await run(bin, [probeArg], { timeoutMs: 15000 });
    return true;
  } catch {
    return false;
  }
}
