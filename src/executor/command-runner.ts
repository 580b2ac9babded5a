import { Inject, Injectable, Logger } from '@nestjs/common';
import { spawn } from 'node:child_process';
import { OrchestratorConfig, orchestratorConfig } from '../config/orchestrator.config';
import { InfrastructureError, errorMessage } from '../common/errors';

export interface CommandSpec {
  command: string;
  cwd: string;
  env: Record<string, string>;
}

export interface OutputHandlers {
  onStdout(line: string): void;
  onStderr(line: string): void;
}

export interface CommandOutcome {
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Runs one step command on a runner. Aborting the signal must terminate the
 * process; spawn failures reject with InfrastructureError.
 */
export abstract class CommandRunner {
  abstract run(spec: CommandSpec, output: OutputHandlers, signal: AbortSignal): Promise<CommandOutcome>;
}

export function createLineBuffer(onLine: (line: string) => void) {
  let buffer = '';

  return {
    write(chunk: string) {
      buffer += chunk;

      // Split into complete lines; keep the last partial line in buffer.
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        onLine(part);
      }
    },
    flush() {
      const remaining = buffer;
      buffer = '';
      if (remaining.length > 0) onLine(remaining);
    },
  };
}

/**
 * Executes commands through the system shell in their own process group, so that
 * termination reaches everything the step started (SIGTERM, then SIGKILL after the grace period).
 */
@Injectable()
export class ShellCommandRunner extends CommandRunner {
  private readonly logger = new Logger(ShellCommandRunner.name);

  constructor(@Inject(orchestratorConfig.KEY) private readonly config: OrchestratorConfig) {
    super();
  }

  run(spec: CommandSpec, output: OutputHandlers, signal: AbortSignal): Promise<CommandOutcome> {
    if (signal.aborted) return Promise.resolve({ exitCode: null, signal: 'SIGTERM' });

    return new Promise<CommandOutcome>((resolve, reject) => {
      const ownGroup = process.platform !== 'win32';
      const child = spawn(spec.command, {
        shell: true,
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        detached: ownGroup,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let spawned = false;
      let killTimer: ReturnType<typeof setTimeout> | null = null;

      const stdoutBuffer = createLineBuffer((line) => output.onStdout(line));
      const stderrBuffer = createLineBuffer((line) => output.onStderr(line));
      child.stdout.on('data', (buf: Buffer) => stdoutBuffer.write(buf.toString('utf8')));
      child.stderr.on('data', (buf: Buffer) => stderrBuffer.write(buf.toString('utf8')));

      const kill = (sig: NodeJS.Signals) => {
        if (child.exitCode !== null || child.signalCode !== null) return;
        try {
          if (ownGroup && child.pid !== undefined) process.kill(-child.pid, sig);
          else child.kill(sig);
        } catch (err) {
          // ESRCH: the group exited between the check and the kill
          this.logger.debug(`kill(${sig}) on pid ${child.pid ?? '?'}: ${errorMessage(err)}`);
        }
      };

      const onAbort = () => {
        kill('SIGTERM');
        killTimer = setTimeout(() => kill('SIGKILL'), this.config.killGraceMs);
      };
      signal.addEventListener('abort', onAbort, { once: true });

      const settle = () => {
        signal.removeEventListener('abort', onAbort);
        if (killTimer) clearTimeout(killTimer);
        // Flush any partial line that didn't end in \n
        stdoutBuffer.flush();
        stderrBuffer.flush();
      };

      child.on('spawn', () => {
        spawned = true;
      });
      child.on('close', (code, sig) => {
        settle();
        resolve({ exitCode: code, signal: sig });
      });
      child.on('error', (err) => {
        if (spawned) {
          this.logger.warn(`Process error for "${spec.command}": ${err.message}`);
          return;
        }
        settle();
        reject(new InfrastructureError(`Could not start step process: ${err.message}`, { cause: err }));
      });
    });
  }
}
