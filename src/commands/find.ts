import { Command } from 'commander';
import { error } from '../utils/ui.js';
import { openSafe } from '../sdk.js';
import { errorMessage } from '../core/errors.js';

export function registerFindCommand(program: Command) {
    /**
     * Find Command
     * Lists protected files below a directory, one per line
     */
    program
        .command('find [directory]')
        .description('List protected files below a directory')
        .action(async (directory: string | undefined) => {
            try {
                const safe = await openSafe();
                for (const path of await safe.find(directory ?? '.')) {
                    console.log(path);
                }
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
