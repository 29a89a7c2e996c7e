import { Command } from 'commander';
import { colors, success, error, info } from '../utils/ui.js';
import { ManifestStore, MANIFEST_FILENAME } from '../core/manifest.js';
import { errorMessage } from '../core/errors.js';

export function registerInitCommand(program: Command) {
    /**
     * Init Command
     * Creates safe.yml in the current directory
     */
    program
        .command('init')
        .description(`Create ${MANIFEST_FILENAME} in the current directory`)
        .requiredOption('-r, --recipient <id...>', 'GPG identity allowed to decrypt protected files')
        .action(async (options: { recipient: string[] }) => {
            try {
                const store = new ManifestStore();
                const manifest = await store.init(options.recipient);

                success(`Created ${manifest.path}`);
                info(`Recipients: ${manifest.recipients.map((r) => colors.cyan(r)).join(', ')}`);
                console.log();
                console.log(colors.bold('Next steps:'));
                console.log(`   ${colors.cyan('safe protect <file>')}   encrypt an existing file`);
                console.log(`   ${colors.cyan('safe edit <file>')}      create or edit a protected file`);
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
