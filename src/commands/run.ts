import { Command } from 'commander';
import { colors, error, consoleLogger } from '../utils/ui.js';
import { openSafe } from '../sdk.js';
import { errorMessage } from '../core/errors.js';

export function registerRunCommands(program: Command) {
    /**
     * Exec Command
     * Runs a command with a protected YAML file's keys as environment variables
     */
    program
        .command('exec')
        .description('Run a command with the keys of a protected YAML file as environment variables')
        .argument('<path>', 'Protected .yml or .yaml file')
        .argument('<command...>', 'Command and arguments to run')
        .option('--dry-run', 'Show the variable names that would be exported without running')
        .passThroughOptions()
        .action(async (path: string, commandArgs: string[], options: { dryRun?: boolean }) => {
            try {
                const safe = await openSafe({ logger: consoleLogger });

                if (options.dryRun) {
                    const env = await safe.previewEnvironment(path);
                    console.log(colors.bold(`\nEnvironment to be exported from ${path}:\n`));
                    for (const key of Object.keys(env)) {
                        console.log(`  ${colors.cyan(key)}=${colors.dim('********')}`);
                    }
                    console.log();
                    console.log(colors.dim(`Command: ${commandArgs.join(' ')}`));
                    return;
                }

                const [command, ...args] = commandArgs;
                if (!command) {
                    error('No command specified. Usage: safe exec <path> <command...>');
                }

                const exitCode = await safe.exportToEnvironment(path, command, args);
                process.exit(exitCode);
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
