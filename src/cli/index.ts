import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { registerConfigCommand } from './commands/config-cmd.js';
import { registerSnapshotCommand } from './commands/snapshot-cmd.js';
import { registerWatchCommand } from './commands/watch-cmd.js';

function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = new Command();

  program
    .name('depsnap')
    .description('Per-target dependency snapshots for multi-targeting projects')
    .version(readPackageVersion());

  registerSnapshotCommand(program);
  registerWatchCommand(program);
  registerConfigCommand(program);

  if (!argv || argv.length <= 2) {
    program.help();
    return;
  }

  await program.parseAsync(argv);
}
