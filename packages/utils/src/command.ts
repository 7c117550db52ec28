/**
 * External command runner
 *
 * Spawns a binary without a shell, captures its output up to a cap and
 * enforces a timeout. A non-zero exit is a result, not an exception; only a
 * failure to spawn rejects.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  /** Milliseconds; 0 disables the timer */
  timeout?: number;
  /** Called with each complete stderr line, for tools that report progress there */
  onStderrLine?: (line: string) => void;
}

const MAX_CAPTURED_BYTES = 10 * 1024 * 1024;
const KILL_GRACE_MS = 10_000;

class OutputBuffer {
  private text = '';
  private bytes = 0;

  append(chunk: Buffer): void {
    if (this.bytes < MAX_CAPTURED_BYTES) {
      this.text += chunk.toString();
      this.bytes += chunk.length;
    }
  }

  toString(): string {
    return this.text;
  }
}

function lineSplitter(onLine: (line: string) => void): { push(chunk: string): void; flush(): void } {
  let pending = '';
  const emit = (line: string) => {
    if (line.trim()) onLine(line);
  };
  return {
    push(chunk) {
      const lines = (pending + chunk).split(/\r?\n|\r/);
      pending = lines.pop() ?? '';
      lines.forEach(emit);
    },
    flush() {
      emit(pending);
      pending = '';
    },
  };
}

export function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { timeout = 300_000, onStderrLine } = options;
  const startedAt = Date.now();

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout = new OutputBuffer();
    const stderr = new OutputBuffer();
    const lines = onStderrLine ? lineSplitter(onStderrLine) : null;
    let timedOut = false;

    const timer = timeout > 0
      ? setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS).unref();
        }, timeout)
      : null;

    child.stdout.on('data', (data: Buffer) => stdout.append(data));
    child.stderr.on('data', (data: Buffer) => {
      stderr.append(data);
      lines?.push(data.toString());
    });

    child.on('error', (error) => {
      if (timer) clearTimeout(timer);
      reject(error);
    });

    child.on('close', (code, signal) => {
      if (timer) clearTimeout(timer);
      lines?.flush();
      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        duration: Date.now() - startedAt,
        timedOut,
      });
    });
  });
}
