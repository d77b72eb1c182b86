import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createCheckCommand } from './commands/check.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));

/** Create the CLI program. `check` is the default command. */
export function createCli(): Command {
  return new Command()
    .name('attrlint')
    .description('Quality-rule diagnostics for package set attributes')
    .version(pkg.version)
    .addCommand(createCheckCommand(), { isDefault: true });
}
