import { InfrastructureError } from '../../src/common/errors';
import {
  CommandOutcome,
  CommandRunner,
  CommandSpec,
  OutputHandlers,
} from '../../src/executor/command-runner';

export interface ScriptedCommand {
  stdout?: string[];
  stderr?: string[];
  exitCode?: number;
  /** Keep running until aborted */
  hang?: boolean;
  /** Keep running until the promise settles (or the step is aborted) */
  until?: Promise<void>;
  /** Reject with InfrastructureError on the first n launches */
  spawnFailures?: number;
}

export interface Deferred {
  promise: Promise<void>;
  resolve(): void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function untilAborted(signal: AbortSignal, other?: Promise<void>): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    signal.addEventListener('abort', () => resolve(), { once: true });
    other?.then(resolve, resolve);
  });
}

/**
 * CommandRunner that never starts a process: each command's output and exit code
 * come from the script. Launches are recorded in `calls`.
 */
export class ScriptedCommandRunner extends CommandRunner {
  readonly calls: CommandSpec[] = [];
  private readonly launches = new Map<string, number>();

  constructor(private readonly script: (command: string) => ScriptedCommand = () => ({})) {
    super();
  }

  commands(): string[] {
    return this.calls.map((c) => c.command);
  }

  async run(spec: CommandSpec, output: OutputHandlers, signal: AbortSignal): Promise<CommandOutcome> {
    const scripted = this.script(spec.command);
    const launch = (this.launches.get(spec.command) ?? 0) + 1;
    this.launches.set(spec.command, launch);

    if (scripted.spawnFailures !== undefined && launch <= scripted.spawnFailures) {
      throw new InfrastructureError(`spawn ${spec.command} failed`);
    }
    this.calls.push(spec);

    for (const line of scripted.stdout ?? []) output.onStdout(line);
    for (const line of scripted.stderr ?? []) output.onStderr(line);

    if (scripted.hang || scripted.until) {
      await untilAborted(signal, scripted.until);
    }
    if (signal.aborted) return { exitCode: null, signal: 'SIGTERM' };
    return { exitCode: scripted.exitCode ?? 0, signal: null };
  }
}
