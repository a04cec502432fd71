// exec.ts - Run external tools (sadf, atopsar, tar, lsblk) with a timeout
import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface ToolResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  // null when the process was killed or never started
  code: number | null;
  timedOut: boolean;
  notFound: boolean;
}

export interface ToolOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export type ToolRunner = (command: string, args: string[], options?: ToolOptions) => Promise<ToolResult>;

const DEFAULT_TIMEOUT_MS = 30000;
const MAX_BUFFER = 64 * 1024 * 1024;

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
  message?: string;
}

function asExecFailure(error: unknown): ExecFailure {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const failure: ExecFailure = {
    message: error instanceof Error ? error.message : String(error)
  };
  if ('code' in error && (typeof error.code === 'number' || typeof error.code === 'string')) failure.code = error.code;
  if ('killed' in error && typeof error.killed === 'boolean') failure.killed = error.killed;
  if ('signal' in error && typeof error.signal === 'string') failure.signal = error.signal;
  if ('stdout' in error && typeof error.stdout === 'string') failure.stdout = error.stdout;
  if ('stderr' in error && typeof error.stderr === 'string') failure.stderr = error.stderr;
  return failure;
}

/**
 * Never rejects: non-zero exits, timeouts and missing binaries come back as
 * ok=false so callers can treat them as absent data.
 */
export const runTool: ToolRunner = async (command, args, options = {}) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxBuffer: MAX_BUFFER,
      encoding: 'utf8',
      env: options.env ?? process.env,
      windowsHide: true
    });
    return { ok: true, stdout, stderr, code: 0, timedOut: false, notFound: false };
  } catch (error) {
    const failure = asExecFailure(error);
    return {
      ok: false,
      stdout: failure.stdout ?? '',
      stderr: failure.stderr ?? failure.message ?? '',
      code: typeof failure.code === 'number' ? failure.code : null,
      timedOut: failure.killed === true && failure.signal === 'SIGTERM',
      notFound: failure.code === 'ENOENT'
    };
  }
};

export function failureReason(command: string, result: ToolResult, timeoutMs: number): string {
  if (result.notFound) return `${command} is not installed`;
  if (result.timedOut) return `${command} timed out after ${timeoutMs}ms`;
  return result.stderr.trim() || `${command} exited with code ${result.code}`;
}

export async function commandExists(runner: ToolRunner, command: string): Promise<boolean> {
  const result = await runner('sh', ['-c', 'command -v "$1"', 'sh', command], { timeoutMs: 5000 });
  return result.ok && result.stdout.trim().length > 0;
}
