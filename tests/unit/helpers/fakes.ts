import type { AssistantClient, AssistantRequest } from '../../../src/core/assistant-client.js';
import type { CredentialStore } from '../../../src/core/credentials.js';
import type { CommandResult, CommandRunner, RunCommandOptions } from '../../../src/core/executor.js';
import { CommandFailure } from '../../../src/utils/errors.js';

interface ScriptedCommand {
  match: string | RegExp;
  result: Partial<CommandResult>;
}

/**
 * In-process stand-in for the shell. Commands succeed with empty output unless
 * a scripted response matches (string → prefix match).
 */
export class FakeRunner implements CommandRunner {
  readonly cwd: string;
  readonly commands: string[] = [];
  private readonly scripted: ScriptedCommand[] = [];

  constructor(cwd = '/workspace') {
    this.cwd = cwd;
  }

  respond(match: string | RegExp, result: Partial<CommandResult>): this {
    this.scripted.push({ match, result });
    return this;
  }

  async run(command: string, options: RunCommandOptions = {}): Promise<CommandResult> {
    this.commands.push(command);
    const hit = this.scripted.find(({ match }) =>
      typeof match === 'string' ? command.startsWith(match) : match.test(command),
    );
    const result: CommandResult = { exitCode: 0, stdout: '', stderr: '', ...hit?.result };

    if ((options.check ?? true) && result.exitCode !== 0) {
      throw new CommandFailure(command, result.exitCode, result.stdout, result.stderr);
    }
    return result;
  }
}

export type ReplyScript = (request: AssistantRequest, callIndex: number) => string | Promise<string>;

export class ScriptedAssistant implements AssistantClient {
  readonly model = 'test-model';
  readonly requests: AssistantRequest[] = [];
  private readonly reply: ReplyScript;

  constructor(reply: ReplyScript) {
    this.reply = reply;
  }

  async complete(request: AssistantRequest): Promise<string> {
    this.requests.push({ system: request.system, messages: [...request.messages] });
    return this.reply(request, this.requests.length - 1);
  }
}

export class MemoryCredentialStore implements CredentialStore {
  readonly location: string;
  readonly tokens: string[] = [];

  constructor(location = '/workspace/.git-credentials') {
    this.location = location;
  }

  async store(token: string): Promise<void> {
    this.tokens.push(token);
  }
}
