import * as readline from 'readline/promises';
import { Writable } from 'stream';

// Forwards writes to stdout except while muted, so typed secrets are not echoed
class MutableOutput extends Writable {
    muted = false;

    _write(chunk: Buffer, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
        if (!this.muted) {
            process.stdout.write(chunk, encoding);
        }
        callback();
    }
}

const ask = async (question: string, secret: boolean): Promise<string> => {
    const output = new MutableOutput();
    const rl = readline.createInterface({ input: process.stdin, output, terminal: Boolean(process.stdin.isTTY) });
    try {
        process.stdout.write(question);
        output.muted = secret;
        const answer = await rl.question('');
        if (secret) {
            process.stdout.write('\n');
        }
        return answer.trim();
    } finally {
        rl.close();
    }
};

export const promptLine = (question: string): Promise<string> => ask(question, false);

export const promptSecret = (question: string): Promise<string> => ask(question, true);

export interface InteractiveCredentials {
    username: string;
    password: string;
    passphrase: string;
}

export const promptCredentials = async (): Promise<InteractiveCredentials> => {
    const username = await promptLine('Enter upstream username: ');
    const password = await promptSecret('Enter upstream password: ');
    const passphrase = await promptSecret('Enter encryption passphrase to protect credentials: ');
    return { username, password, passphrase };
};
