import readline from 'readline';

/**
 * Line-at-a-time prompts over a readline interface. Lines that arrive before
 * a prompt is asked are queued, and `ask` resolves to null once input ends.
 */
export class PromptSession {
    private readonly rl: readline.Interface;
    private readonly pending: string[] = [];
    private readonly waiters: Array<(line: string | null) => void> = [];
    private closed = false;

    constructor(input: NodeJS.ReadableStream, private readonly output: NodeJS.WritableStream) {
        this.rl = readline.createInterface({ input, terminal: false });

        this.rl.on('line', line => {
            const waiter = this.waiters.shift();
            if (waiter) {
                waiter(line);
            } else {
                this.pending.push(line);
            }
        });

        this.rl.on('close', () => {
            this.closed = true;
            for (const waiter of this.waiters.splice(0)) {
                waiter(null);
            }
        });
    }

    ask(prompt: string): Promise<string | null> {
        this.output.write(prompt);

        const queued = this.pending.shift();
        if (queued !== undefined) {
            return Promise.resolve(queued);
        }
        if (this.closed) {
            return Promise.resolve(null);
        }

        return new Promise(resolve => {
            this.waiters.push(resolve);
        });
    }

    close(): void {
        this.rl.close();
    }
}
