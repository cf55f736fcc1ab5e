import type { CommandResult, CommandRunner, CommandSpec } from './types';
import { CommandSpawnError } from './errors';

type ScriptedResponse =
  | Partial<CommandResult>
  | ((spec: CommandSpec) => Partial<CommandResult>)
  | Error;

/**
 * In-memory CommandRunner for tests. Responses are matched by the command
 * line (`command arg1 arg2`) prefix; the longest matching prefix wins.
 * Unmatched commands succeed with empty output.
 */
export class TestCommandRunner implements CommandRunner {
  public calls: CommandSpec[] = [];
  private responses = new Map<string, ScriptedResponse[]>();

  /**
   * Queue a response for commands whose line starts with `prefix`. The
   * last queued response repeats once the queue is drained.
   */
  public respond(prefix: string, ...responses: ScriptedResponse[]): this {
    this.responses.set(prefix, [
      ...(this.responses.get(prefix) ?? []),
      ...responses,
    ]);

    return this;
  }

  public commandLines(): string[] {
    return this.calls.map((call) => TestCommandRunner.lineOf(call));
  }

  public run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);

    const line = TestCommandRunner.lineOf(spec);
    const prefix = [...this.responses.keys()]
      .filter((key) => line.startsWith(key))
      .sort((a, b) => b.length - a.length)[0];

    const queue = prefix === undefined ? undefined : this.responses.get(prefix);
    const response = queue && queue.length > 1 ? queue.shift() : queue?.[0];

    if (response instanceof Error) {
      return Promise.reject(
        new CommandSpawnError(
          { command: spec.command, args: spec.args ?? [] },
          response,
        ),
      );
    }

    const partial =
      typeof response === 'function' ? response(spec) : (response ?? {});

    return Promise.resolve({
      exitCode: 0,
      signal: null,
      stdout: '',
      stderr: '',
      ...partial,
    });
  }

  private static lineOf(spec: CommandSpec): string {
    return [spec.command, ...(spec.args ?? [])].join(' ');
  }
}
