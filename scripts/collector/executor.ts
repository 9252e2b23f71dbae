import { execFile } from "node:child_process";

import { AuthenticationError, DataDecodeError, ExternalToolError, type ExternalToolFailure } from "./errors";

export interface CommandExecutor {
  /**
   * Runs `argv[0]` with the remaining arguments (no shell) and returns stdout
   * decoded as JSON, or `null` when the command printed nothing.
   */
  execute(argv: readonly string[]): Promise<unknown>;
}

export interface CommandExecutorOptions {
  /** Kill the child after this many milliseconds. */
  timeoutMs?: number | null;
  /** Kill the child once stdout or stderr grows past this size. */
  maxOutputBytes?: number;
  debug?: boolean;
}

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;
const OUTPUT_LIMIT_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";
const AUTH_HINTS = ["authentication", "gh auth login", "not logged in"];

interface ProcessOutput {
  stdout: string;
  stderr: string;
}

function runProcess(argv: readonly string[], timeoutMs: number | null, maxOutputBytes: number): Promise<ProcessOutput> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(
      new ExternalToolError({ argv, stderr: "", exitCode: null }, "No command given to executor")
    );
  }

  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: "utf8", maxBuffer: maxOutputBytes, timeout: timeoutMs ?? 0, windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }

        const code: unknown = error.code;
        // an output overrun also kills the child
        const timedOut = error.killed === true && code !== OUTPUT_LIMIT_CODE && timeoutMs !== null && timeoutMs > 0;
        const failure: ExternalToolFailure = {
          argv,
          stderr: stderr || (timedOut ? `timed out after ${timeoutMs}ms` : error.message),
          exitCode: typeof code === "number" ? code : null,
          timedOut,
          cause: error,
        };

        const lowered = stderr.toLowerCase();
        if (AUTH_HINTS.some((hint) => lowered.includes(hint))) {
          reject(new AuthenticationError(failure));
          return;
        }
        reject(new ExternalToolError(failure));
      }
    );
  });
}

/**
 * Parses command output as one JSON document, falling back to one document
 * per line (`gh api --paginate --jq` prints a value per page).
 */
export function decodeJsonOutput(stdout: string, operation: string): unknown {
  const trimmed = stdout.trim();
  if (trimmed.length === 0) {
    return null;
  }

  try {
    return JSON.parse(trimmed);
  } catch (error) {
    const documents = parseEachLine(trimmed);
    if (documents) {
      return documents;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new DataDecodeError(operation, reason, trimmed, { cause: error });
  }
}

function parseEachLine(text: string): unknown[] | null {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length < 2) {
    return null;
  }
  try {
    return lines.map((line): unknown => JSON.parse(line));
  } catch {
    return null;
  }
}

export function createCommandExecutor(options: CommandExecutorOptions = {}): CommandExecutor {
  const timeoutMs = options.timeoutMs ?? null;
  const maxOutputBytes = options.maxOutputBytes ?? MAX_OUTPUT_BYTES;

  return {
    async execute(argv) {
      if (options.debug) {
        console.log(`[exec] ${argv.join(" ")}`);
      }
      const { stdout } = await runProcess(argv, timeoutMs, maxOutputBytes);
      return decodeJsonOutput(stdout, `output of '${argv.join(" ")}'`);
    },
  };
}
