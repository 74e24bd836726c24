/**
 * postgis-lab - Docker command runner fake
 *
 * Records each docker invocation and answers it from the first handler
 * whose prefix matches the joined argument list.
 */

import type { CommandRunner, ExecOptions, ExecResult } from '../../docker/index.js';

export interface RecordedCommand {
    command: string;
    args: string[];
    options?: ExecOptions | undefined;
}

type Answer = Partial<ExecResult> | ((call: RecordedCommand) => Partial<ExecResult>);

interface Handler {
    prefix: string;
    answer: Answer;
    remaining: number;
}

export class FakeDockerRunner {
    public calls: RecordedCommand[] = [];
    private handlers: Handler[] = [];

    /** Answer every command whose arguments start with `prefix` */
    on(prefix: string, answer: Answer): this {
        this.handlers.push({ prefix, answer, remaining: Infinity });
        return this;
    }

    /** Answer the next `times` matching commands, then fall through */
    once(prefix: string, answer: Answer, times = 1): this {
        this.handlers.push({ prefix, answer, remaining: times });
        return this;
    }

    /** `command args...` of every call, in order */
    get commands(): string[] {
        return this.calls.map((call) => [call.command, ...call.args].join(' '));
    }

    runner: CommandRunner = async (command, args, options) => {
        const call: RecordedCommand = { command, args, options };
        this.calls.push(call);
        const joined = args.join(' ');
        const handler = this.handlers.find((h) => h.remaining > 0 && joined.startsWith(h.prefix));
        if (!handler) {
            return { stdout: '', stderr: '', exitCode: 0 };
        }
        handler.remaining--;
        const answer = typeof handler.answer === 'function' ? handler.answer(call) : handler.answer;
        return { stdout: '', stderr: '', exitCode: 0, ...answer };
    };
}
