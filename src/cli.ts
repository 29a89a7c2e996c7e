#!/usr/bin/env node
/**
 * Safe CLI
 *
 * Command-line interface over the lifecycle engine.
 */

import { Command } from 'commander';
import { loadSettings } from './core/config.js';
import { setVerbose } from './utils/ui.js';
import { registerInitCommand } from './commands/init.js';
import { registerFileCommands } from './commands/files.js';
import { registerFindCommand } from './commands/find.js';
import { registerRunCommands } from './commands/run.js';

const program = new Command();

program
    .name('safe')
    .description('Keep GPG-encrypted files, their recipients and their git history consistent')
    .version('1.0.0')
    .option('-v, --verbose', 'Print debug output')
    .enablePositionalOptions()
    .hook('preAction', (thisCommand) => {
        const opts = thisCommand.opts<{ verbose?: boolean }>();
        setVerbose(Boolean(opts.verbose) || loadSettings().debug);
    });

registerInitCommand(program);
registerFileCommands(program);
registerFindCommand(program);
registerRunCommands(program);

await program.parseAsync();
