import { CommandOptions, CommandResult, CommandRunner } from '../../executor/CommandRunner';

export interface RecordedCall {
    command: string;
    args: string[];
    options: CommandOptions;
}

export type CommandHandler = (call: RecordedCall) => Partial<CommandResult> | Promise<Partial<CommandResult>>;

/**
 * In-process CommandRunner: records every call and answers from a handler
 */
export class FakeCommandRunner implements CommandRunner {
    calls: RecordedCall[] = [];

    constructor(private handler: CommandHandler = () => ({})) {}

    async run(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
        const call = { command, args, options };
        this.calls.push(call);
        const result = await this.handler(call);
        return { exitCode: 0, stdout: '', stderr: '', duration: 0, ...result };
    }

    commands(): string[] {
        return this.calls.map(call => [call.command, ...call.args].join(' '));
    }
}
