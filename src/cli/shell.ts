import * as readline from 'readline';
import { PROMPT } from '../config';
import { CommandInterpreter } from './interpreter';

export interface ShellOptions {
    interpreter: CommandInterpreter;
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    prompt?: string;
}

/**
 * Runs the read-dispatch loop until `quit`, `EOF` or end of input.
 *
 * The prompt is written before every line whether or not the input is a
 * terminal, so piped sessions echo it too. Each command finishes before the
 * next line is handled.
 */
export async function startShell({ interpreter, input, output, prompt = PROMPT }: ShellOptions): Promise<void> {
    const lines = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });
    try {
        output.write(prompt);
        for await (const line of lines) {
            const outcome = await interpreter.execute(line);
            if (outcome === 'quit') {
                return;
            }
            output.write(prompt);
        }
    } finally {
        lines.close();
    }
}
