import {createInterface} from 'node:readline';
import type {Interface} from 'node:readline';
import type {Prompter} from './Prompter';

/**
 * readline による Prompter の実装
 *
 * 行はキューに溜めてから質問に割り当てる。
 * パイプで流し込まれた入力のように、質問より先に届いた行も取りこぼさない。
 */
export class ConsolePrompter implements Prompter {
    private readonly rl: Interface;
    private readonly pendingLines: string[] = [];
    private waiting: ((line: string | null) => void) | null = null;
    private closed = false;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl = createInterface({input});

        this.rl.on('line', (line) => {
            const waiting = this.takeWaiting();
            if (waiting) {
                waiting(line);
            } else {
                this.pendingLines.push(line);
            }
        });

        this.rl.on('close', () => {
            this.closed = true;
            this.takeWaiting()?.(null);
        });
    }

    ask(question: string): Promise<string | null> {
        this.output.write(question);

        const line = this.pendingLines.shift();
        if (line !== undefined) {
            return Promise.resolve(line);
        }
        if (this.closed) {
            return Promise.resolve(null);
        }

        return new Promise((resolve) => {
            this.waiting = resolve;
        });
    }

    print(line: string): void {
        this.output.write(`${line}\n`);
    }

    close(): void {
        if (!this.closed) {
            this.rl.close();
        }
    }

    private takeWaiting(): ((line: string | null) => void) | null {
        const waiting = this.waiting;
        this.waiting = null;
        return waiting;
    }
}
