import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export type CommandOptions = {
  env?: NodeJS.ProcessEnv;
  // 0 (the default) waits for the child however long it takes.
  timeoutMs?: number;
};

export type CommandResult = { ok: boolean; stdout: string; stderr: string; code?: number };

export type CommandRunner = (file: string, args: string[], opts?: CommandOptions) => Promise<CommandResult>;

type ExecFailure = { stdout?: unknown; stderr?: unknown; code?: unknown; message?: unknown };

function isExecFailure(value: unknown): value is ExecFailure {
  return typeof value === 'object' && value !== null;
}

export const runCommand: CommandRunner = async (file, args, opts) => {
  try {
    const res = await execFileAsync(file, args, {
      env: opts?.env ?? process.env,
      timeout: opts?.timeoutMs ?? 0,
      maxBuffer: 16 * 1024 * 1024
    });
    return { ok: true, stdout: String(res.stdout ?? ''), stderr: String(res.stderr ?? ''), code: 0 };
  } catch (e: unknown) {
    const err: ExecFailure = isExecFailure(e) ? e : {};
    return {
      ok: false,
      stdout: String(err.stdout ?? ''),
      stderr: String(err.stderr ?? err.message ?? ''),
      code: typeof err.code === 'number' ? err.code : undefined
    };
  }
};

// Single-quote a value for `sh -c`.
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
