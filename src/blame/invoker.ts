import { spawn, type SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { RepoLocation } from '../git/types.js';
import { repoEnv } from '../git/bridge.js';
import type { InvocationResult } from './types.js';
import { errorMessage } from '../errors.js';

const STDERR_SNIPPET_LENGTH = 2000;

export interface BlameRequest {
  executable: string;
  filePath: string;       // Absolute
  repo: RepoLocation;
  extraArgs?: string[];
}

export type BlameInvoker = (request: BlameRequest) => Promise<InvocationResult>;

/** The part of a ChildProcess the invoker relies on. */
export interface SpawnedProcess {
  stdout: Readable | null;
  stderr: Readable | null;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type Spawner = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess;

const defaultSpawner: Spawner = (command, args, options) => spawn(command, args, options);

/** Split captured stdout into lines without their terminators. */
export function splitOutputLines(output: string): string[] {
  if (!output) return [];
  const body = output.endsWith('\n') ? output.slice(0, -1) : output;
  return body.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

export function invokeBlame(request: BlameRequest, spawner: Spawner = defaultSpawner): Promise<InvocationResult> {
  const args = ['blame', ...(request.extraArgs ?? []), request.filePath];

  return new Promise(resolve => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const settle = (result: InvocationResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    let child: SpawnedProcess;
    try {
      child = spawner(request.executable, args, {
        env: repoEnv(request.repo),
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (err) {
      settle({ status: 'failed', exitCode: null, signal: null, stderr: '', error: errorMessage(err) });
      return;
    }

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.once('error', err => {
      settle({ status: 'failed', exitCode: null, signal: null, stderr: snippet(stderr), error: err.message });
    });

    child.once('close', (code, signal) => {
      if (code === 0) {
        settle({ status: 'completed', lines: splitOutputLines(Buffer.concat(stdout).toString('utf-8')) });
      } else {
        settle({ status: 'failed', exitCode: code, signal, stderr: snippet(stderr) });
      }
    });
  });
}

function snippet(chunks: Buffer[]): string {
  const text = Buffer.concat(chunks).toString('utf-8').trimEnd();
  return text.length > STDERR_SNIPPET_LENGTH ? text.slice(-STDERR_SNIPPET_LENGTH) : text;
}
