import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

interface ExecFailure {
  stdout: string;
  stderr: string;
  code: unknown;
  killed: boolean;
  message: string;
}

function asExecFailure(err: unknown): ExecFailure {
  if (typeof err !== "object" || err === null) {
    return { stdout: "", stderr: "", code: undefined, killed: false, message: String(err) };
  }
  const source: object = err;
  const field = (key: string): unknown => Reflect.get(source, key);
  const text = (value: unknown) => (value === undefined || value === null ? "" : String(value));
  return {
    stdout: text(field("stdout")),
    stderr: text(field("stderr")),
    code: field("code"),
    killed: field("killed") === true,
    message: text(field("message")),
  };
}

export async function runCommand(command: string, args: string[], options?: { cwd?: string; timeoutMs?: number; env?: Record<string, string>; }): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      encoding: "utf8",
      maxBuffer: 16 * 1024 * 1024,
    });

    return { stdout, stderr, exitCode: 0 };
  } catch (err) {
    const failure = asExecFailure(err);
    const stdout = failure.stdout;
    const stderr = failure.stderr || failure.message;
    const exitCode = typeof failure.code === "number" ? failure.code : 1;
    const reason = failure.killed ? "timed out" : `code=${exitCode}`;
    throw new Error(`Command failed (${command} ${args.join(" ")}): ${reason}\nSTDERR: ${stderr}\nSTDOUT: ${stdout}`, { cause: err });
  }
}
