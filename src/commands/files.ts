import { Command } from 'commander';
import { colors, success, error, info, consoleLogger } from '../utils/ui.js';
import { openSafe } from '../sdk.js';
import { errorMessage } from '../core/errors.js';

interface CommitFlag {
    commit?: boolean;
}

export function registerFileCommands(program: Command) {
    /**
     * Protect Command
     * Encrypts an existing plaintext file and deletes the plaintext
     */
    program
        .command('protect <path>')
        .description('Encrypt an existing file and stop keeping it in plaintext')
        .option('-c, --commit', 'Commit the change to git')
        .action(async (path: string, options: CommitFlag) => {
            try {
                const safe = await openSafe({ logger: consoleLogger });
                const target = await safe.protect(path, { commit: options.commit });
                success(`Wrote ${colors.cyan(target)}`);
            } catch (err) {
                error(errorMessage(err));
            }
        });

    /**
     * Edit Command
     * Decrypts into a scratch file, opens $EDITOR and re-encrypts on change
     */
    program
        .command('edit <path>')
        .description('Edit a protected file, creating it if it does not exist')
        .option('-c, --commit', 'Commit the change to git')
        .action(async (path: string, options: CommitFlag) => {
            try {
                const safe = await openSafe({ logger: consoleLogger });
                const result = await safe.edit(path, { commit: options.commit });
                if (result.changed) {
                    success(`Saved ${colors.cyan(result.path)}`);
                }
            } catch (err) {
                error(errorMessage(err));
            }
        });

    /**
     * Remove Command
     * Deletes a protected file and drops it from the manifest
     */
    program
        .command('remove <path>')
        .alias('rm')
        .description('Delete a protected file')
        .option('-c, --commit', 'Commit the change to git')
        .action(async (path: string, options: CommitFlag) => {
            try {
                const safe = await openSafe({ logger: consoleLogger });
                const target = await safe.remove(path, { commit: options.commit });
                success(`Deleted ${colors.cyan(target)}`);
            } catch (err) {
                error(errorMessage(err));
            }
        });

    /**
     * Print Command
     * Writes the decrypted content to stdout
     */
    program
        .command('print <path>')
        .description('Print the decrypted content of a protected file')
        .action(async (path: string) => {
            try {
                const safe = await openSafe();
                const plaintext = await safe.reveal(path);
                process.stdout.write(Buffer.concat([plaintext, Buffer.from('\n')]));
            } catch (err) {
                error(errorMessage(err));
            }
        });

    /**
     * Reencrypt Command
     * Re-encrypts every protected file for the current recipients
     */
    program
        .command('reencrypt')
        .description('Re-encrypt every protected file for the current recipients and overrides')
        .option('-c, --commit', 'Commit each re-encrypted file to git')
        .action(async (options: CommitFlag) => {
            try {
                const safe = await openSafe({ logger: consoleLogger });
                const done = await safe.reencryptAll({ commit: options.commit });
                if (done.length === 0) {
                    info('No protected files');
                } else {
                    success(`Re-encrypted ${done.length} file(s)`);
                }
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
