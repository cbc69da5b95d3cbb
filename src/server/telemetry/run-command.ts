import { execFile } from 'node:child_process';

export interface RunOptions {
  timeoutMs: number;
  /** Label used in error messages, e.g. "Docker logs". */
  label?: string;
}

export function runCommand(file: string, args: string[], opts: RunOptions): Promise<string> {
  const label = opts.label ?? file;
  return new Promise((resolve, reject) => {
    execFile(file, args, { timeout: opts.timeoutMs, maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (!error) {
        resolve(stdout);
        return;
      }
      if (error.code === 'ENOENT') {
        reject(new Error(`${file} command not found`));
      } else if (error.killed && error.signal) {
        reject(new Error(`${label} command timed out`));
      } else {
        reject(new Error(`${label} command failed: ${(stderr || error.message).trim()}`));
      }
    });
  });
}
