// Remote command execution over the system OpenSSH client
// Password auth goes through `sshpass -e`, so the secret only ever travels in the SSHPASS variable

import { spawn } from 'child_process';
import { homedir } from 'os';
import type { Asset } from '../assets/types.js';
import { TransportError } from '../../utils/errors.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';

const MAX_STREAM_CHARS = 100000;
const TRUNCATION_MARKER = '\n[output truncated]';
const SSH_FAILURE_EXIT_CODE = 255;
const PACKAGE_MANAGER_PATTERN = /(^|[\s;&|(])(sudo\s+)?(apt|apt-get|dnf|yum|zypper)(\s|$)/i;

export interface CommandResult {
  /** stdout, then `[stderr]` and stderr when there was any */
  output: string;
  exitCode: number | null;
}

export interface RemoteExecutor {
  run(asset: Asset, command: string, timeoutMs?: number): Promise<CommandResult>;
  push(asset: Asset, content: Buffer, remotePath: string): Promise<void>;
  /** Timeout a command gets when the caller passes none. */
  timeoutFor(command: string): number;
}

export interface SshExecutorOptions {
  connectTimeoutSeconds: number;
  commandTimeoutMs: number;
  longCommandTimeoutMs: number;
  logger?: Logger;
}

export interface SshInvocation {
  file: string;
  args: string[];
  env: NodeJS.ProcessEnv;
}

interface CapturedProcess {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return `${homedir()}${path.slice(1)}`;
  return path;
}

/** Single-quote a string for a POSIX shell. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function buildSshInvocation(asset: Asset, remoteCommand: string, connectTimeoutSeconds: number): SshInvocation {
  if (!asset.password && !asset.privateKeyPath) {
    throw new TransportError(
      `Asset "${asset.name}" has neither a password nor a private key configured; it cannot be connected to`,
    );
  }

  const sshArgs = [
    '-o', 'StrictHostKeyChecking=no',
    '-o', 'LogLevel=ERROR',
    '-o', `ConnectTimeout=${connectTimeoutSeconds}`,
    '-p', String(asset.port),
  ];

  if (asset.privateKeyPath) {
    sshArgs.push('-o', 'BatchMode=yes', '-i', expandHome(asset.privateKeyPath));
  }

  sshArgs.push(`${asset.username}@${asset.host}`, remoteCommand);

  if (asset.password) {
    return {
      file: 'sshpass',
      args: ['-e', 'ssh', ...sshArgs],
      env: { ...process.env, SSHPASS: asset.password },
    };
  }

  return { file: 'ssh', args: sshArgs, env: { ...process.env } };
}

export function mergeOutput(stdout: string, stderr: string, exitCode: number | null): string {
  let output = stdout;
  if (stderr) {
    output += `\n[stderr]\n${stderr}`;
  }
  if (exitCode !== null && exitCode !== 0 && !output.trim()) {
    output = `[exit code ${exitCode}]`;
  }
  return output;
}

export function commandTimeout(command: string, options: Pick<SshExecutorOptions, 'commandTimeoutMs' | 'longCommandTimeoutMs'>): number {
  if (PACKAGE_MANAGER_PATTERN.test(command.trim())) {
    return Math.max(options.commandTimeoutMs, options.longCommandTimeoutMs);
  }
  return options.commandTimeoutMs;
}

function appendCapped(current: string, chunk: string): string {
  if (current.endsWith(TRUNCATION_MARKER)) return current;
  if (current.length + chunk.length <= MAX_STREAM_CHARS) return current + chunk;
  return current + chunk.slice(0, MAX_STREAM_CHARS - current.length) + TRUNCATION_MARKER;
}

function spawnCapture(invocation: SshInvocation, timeoutMs: number, input?: Buffer): Promise<CapturedProcess> {
  return new Promise((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const child = spawn(invocation.file, invocation.args, {
      env: invocation.env,
      stdio: [input ? 'pipe' : 'ignore', 'pipe', 'pipe'],
    });

    const timeoutHandle = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill('SIGKILL');
      reject(new TransportError(`Command timed out after ${Math.round(timeoutMs / 1000)} seconds`, true));
    }, timeoutMs);

    child.stdout?.on('data', (data: Buffer) => {
      stdout = appendCapped(stdout, data.toString('utf8'));
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr = appendCapped(stderr, data.toString('utf8'));
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutHandle);
      if (error.code === 'ENOENT') {
        const hint = invocation.file === 'sshpass'
          ? 'Install sshpass to use password authentication'
          : 'Install the OpenSSH client';
        reject(new TransportError(`${invocation.file} was not found. ${hint}`));
        return;
      }
      reject(new TransportError(`Failed to start ${invocation.file}: ${error.message}`));
    });

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutHandle);
      resolve({ stdout, stderr, exitCode: code });
    });

    if (input && child.stdin) {
      child.stdin.on('error', () => {
        // EPIPE when ssh exits early; the close handler reports the failure
      });
      child.stdin.end(input);
    }
  });
}

export class SshExecutor implements RemoteExecutor {
  private readonly sessions = new KeyedMutex();
  private readonly logger: Logger;

  constructor(private readonly options: SshExecutorOptions) {
    this.logger = (options.logger ?? rootLogger).child({ module: 'ssh-executor' });
  }

  timeoutFor(command: string): number {
    return commandTimeout(command, this.options);
  }

  async run(asset: Asset, command: string, timeoutMs: number = this.timeoutFor(command)): Promise<CommandResult> {
    const invocation = buildSshInvocation(asset, command, this.options.connectTimeoutSeconds);

    return this.sessions.runExclusive(asset.name, async () => {
      const startTime = Date.now();
      this.logger.info({ asset: asset.name, host: asset.host, port: asset.port, command, timeoutMs }, 'Running remote command');

      const { stdout, stderr, exitCode } = await spawnCapture(invocation, timeoutMs);

      if (exitCode === SSH_FAILURE_EXIT_CODE) {
        const detail = stderr.trim();
        throw new TransportError(
          `SSH connection to ${asset.username}@${asset.host}:${asset.port} failed${detail ? `: ${detail}` : ''}`,
        );
      }

      const output = mergeOutput(stdout, stderr, exitCode);
      this.logger.info(
        { asset: asset.name, command, exitCode, outputLength: output.length, durationMs: Date.now() - startTime },
        'Remote command finished',
      );
      return { output, exitCode };
    });
  }

  async push(asset: Asset, content: Buffer, remotePath: string): Promise<void> {
    const invocation = buildSshInvocation(asset, `cat > ${shellQuote(remotePath)}`, this.options.connectTimeoutSeconds);

    await this.sessions.runExclusive(asset.name, async () => {
      this.logger.info({ asset: asset.name, remotePath, bytes: content.length }, 'Pushing file');

      const { stderr, exitCode } = await spawnCapture(invocation, this.options.longCommandTimeoutMs, content);
      if (exitCode !== 0) {
        const detail = stderr.trim() || `exit code ${exitCode}`;
        throw new TransportError(`Upload to ${asset.name}:${remotePath} failed: ${detail}`);
      }
    });
  }
}
