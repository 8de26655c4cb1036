/**
 * In-process stand-in for external commands in tests
 */

import type { CommandOptions, CommandResult, CommandRunner } from '../exec/command-runner.js';

export interface RecordedCommand {
  command: string;
  args: string[];
  options: CommandOptions;
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly respond: (call: RecordedCommand) => CommandResult | Error) {}

  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const call = { command, args: [...args], options };
    this.calls.push(call);
    const response = this.respond(call);
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }
}
