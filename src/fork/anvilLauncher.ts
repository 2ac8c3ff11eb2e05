/**
 * Anvil process launcher
 * Spawns a forked simulator bound to a local port and keeps a tail of its
 * output for diagnostics.
 */

import { spawn } from 'child_process';
import { createServer } from 'net';

const OUTPUT_TAIL_BYTES = 8192;

export interface ForkLaunchOptions {
  bin: string;
  forkUrl: string;
  host: string;
  port: number;
  computeUnitsPerSecond: number;
  extraArgs?: readonly string[];
}

export interface ForkProcess {
  readonly pid: number | undefined;
  /** Resolves with the exit code (null when killed by signal or never started). */
  readonly exited: Promise<number | null>;
  hasExited(): boolean;
  kill(): void;
  output(): string;
}

export type ForkLauncher = (options: ForkLaunchOptions) => ForkProcess;

export function buildAnvilArgs(options: ForkLaunchOptions): string[] {
  return [
    '--fork-url',
    options.forkUrl,
    '--port',
    String(options.port),
    '--host',
    options.host,
    '--no-storage-caching',
    '--compute-units-per-second',
    String(options.computeUnitsPerSecond),
    ...(options.extraArgs ?? []),
  ];
}

export const spawnAnvil: ForkLauncher = (options) => {
  const proc = spawn(options.bin, buildAnvilArgs(options), {
    stdio: ['ignore', 'pipe', 'pipe'],
    env: { ...process.env },
  });

  let tail = '';
  let exited = false;
  const append = (chunk: Buffer | string) => {
    tail = (tail + chunk.toString()).slice(-OUTPUT_TAIL_BYTES);
  };

  proc.stdout.on('data', append);
  proc.stderr.on('data', append);

  const exitedPromise = new Promise<number | null>((resolve) => {
    proc.on('exit', (code) => {
      exited = true;
      resolve(code);
    });
    proc.on('error', (error) => {
      // Spawn failures (ENOENT) never emit 'exit'
      append(`\n[spawn error] ${error.message}\n`);
      exited = true;
      resolve(null);
    });
  });

  return {
    pid: proc.pid,
    exited: exitedPromise,
    hasExited: () => exited,
    kill: () => {
      if (!exited) {
        proc.kill('SIGKILL');
      }
    },
    output: () => tail,
  };
};

/**
 * Ask the OS for an unused local port.
 */
export function findFreePort(host = '127.0.0.1'): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.unref();
    server.on('error', reject);
    server.listen(0, host, () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new Error('Could not determine a free port'));
        return;
      }
      const { port } = address;
      server.close(() => resolve(port));
    });
  });
}
