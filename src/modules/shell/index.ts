import readline from 'readline';
import { SearchKind } from '../../types';
import { formatResults } from '../formatter';
import { isQuitCommand, parseSearchKind, Session } from '../session';

export interface ShellIO {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
}

export const MENU = [
    '',
    'Choose a search type:',
    '  1) zip',
    '  2) uhf',
    '  3) borough',
    '  4) date',
    '  q) quit',
].join('\n');

const PROMPTS: Record<SearchKind, string> = {
    zip: 'Enter 5-digit zip: ',
    uhf: 'Enter UHF id: ',
    borough: 'Enter borough name: ',
    date: 'Enter date as YYYY/MM/DD: ',
};

/**
 * Menu loop over an already loaded session. Ends on a quit command or when
 * the input runs out.
 */
export async function runShell(session: Session, io: ShellIO = { input: process.stdin, output: process.stdout }): Promise<void> {
    const rl = readline.createInterface({ input: io.input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();
    const print = (text: string) => io.output.write(`${text}\n`);

    const ask = async (prompt: string): Promise<string | null> => {
        io.output.write(prompt);
        const next = await lines.next();
        return next.done ? null : String(next.value).trim();
    };

    try {
        for (;;) {
            print(MENU);
            const choice = await ask('Enter choice: ');
            if (choice === null || isQuitCommand(choice)) break;

            const kind = parseSearchKind(choice);
            if (!kind) {
                print('Invalid choice.');
                continue;
            }

            const term = await ask(PROMPTS[kind]);
            if (term === null) break;
            for (const line of formatResults(session.search(kind, term))) print(line);
        }
        print('Goodbye.');
    } finally {
        rl.close();
    }
}
