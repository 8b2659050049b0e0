import { spawn } from 'node:child_process';

import type { Combination } from './combinations.ts';
import { logger } from './logger.ts';
import type { ProbeResult, UnlockProbe } from './probe.ts';
import { ProbeToolUnavailableError } from './RecoverError.ts';

/** Bytes of the tool's stderr kept for debug logging. */
const STDERR_LIMIT = 4096;

export interface KeepassxcProbeOptions {
  /** Path or name of the `keepassxc-cli` executable. Default: `keepassxc-cli`. */
  executable?: string;
  /** Arguments placed before the `open` command. */
  args?: string[];
}

/** Runs `keepassxc-cli open` once per attempt. Exit status 0 means the database was unlocked. */
export class KeepassxcProbe implements UnlockProbe {
  readonly executable: string;
  private args: string[];
  private log = logger.child({ component: 'probe' });

  constructor(opts: KeepassxcProbeOptions = {}) {
    this.executable = opts.executable ?? 'keepassxc-cli';
    this.args = opts.args ?? [];
  }

  /** Command-line arguments for one attempt. The passphrase is never among them. */
  static buildArgs(targetPath: string, combination: Combination): string[] {
    const args = ['open', '--quiet'];

    if (combination.keyfile !== null) {
      args.push('--key-file', combination.keyfile);
    }
    if (combination.slot !== null) {
      args.push('--yubikey', String(combination.slot));
    }
    if (combination.passphrase === null) {
      args.push('--no-password');
    }

    args.push(targetPath);
    return args;
  }

  attempt(targetPath: string, combination: Combination, timeoutMs: number): Promise<ProbeResult> {
    const args = [...this.args, ...KeepassxcProbe.buildArgs(targetPath, combination)];

    return new Promise((resolve) => {
      let settled = false;
      let timedOut = false;
      let stderr = '';

      const child = spawn(this.executable, args, { stdio: ['pipe', 'ignore', 'pipe'] });

      const finish = (result: ProbeResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      // A stuck attempt is killed, and only reported once the process is gone.
      // A process that already exited keeps its exit status, even if its streams are still open.
      const timer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          timedOut = true;
          child.kill('SIGKILL');
        }
      }, timeoutMs);

      child.once('error', (error) => {
        // Failing to spawn never produces an exit.
        if (child.pid === undefined) {
          finish({ kind: 'tool-error', error: new ProbeToolUnavailableError(this.executable, error) });
        } else {
          this.log.warn('Unlock tool process error', { error: error.message });
        }
      });

      child.once('close', (code, signal) => {
        if (timedOut) {
          finish({ kind: 'timed-out' });
        } else if (code === 0) {
          finish({ kind: 'success' });
        } else if (code === null) {
          const error = new ProbeToolUnavailableError(this.executable, `terminated by ${signal ?? 'unknown signal'}`);
          finish({ kind: 'tool-error', error });
        } else {
          this.log.debug('Unlock tool rejected combination', { code, stderr: stderr.trim() });
          finish({ kind: 'failure', exitCode: code });
        }
      });

      child.stderr.setEncoding('utf-8');
      child.stderr.on('data', (chunk: string) => {
        if (stderr.length < STDERR_LIMIT) {
          stderr += chunk.slice(0, STDERR_LIMIT - stderr.length);
        }
      });

      // The tool may exit before reading its input.
      child.stdin.on('error', (error) => {
        this.log.debug('Unlock tool closed its input early', { error: error.message });
      });

      if (combination.passphrase === null) {
        child.stdin.end();
        return;
      }

      using bytes = combination.passphrase.reveal();
      const input = Buffer.alloc(bytes.length + 1);
      input.set(bytes);
      input[bytes.length] = 0x0a;

      child.stdin.end(input, () => input.fill(0));
    });
  }
}
