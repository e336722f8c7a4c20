import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getErrorMessage } from '../../utils/error-utils.js';
import { print } from '../../utils/logger.js';
import { renderSnapshot, snapshotToJson } from '../render.js';
import { closeProjectSession, openProjectSession, waitForSnapshot } from '../session.js';

interface SnapshotCommandOptions {
  json?: boolean;
}

export function registerSnapshotCommand(program: Command): void {
  program
    .command('snapshot [manifest]')
    .description('Build the dependency snapshot of a project once and print it')
    .option('--json', 'print the snapshot as JSON')
    .action(async (manifest: string | undefined, options: SnapshotCommandOptions): Promise<void> => {
      const spinner = ora({ text: chalk.white('Loading project...'), color: 'cyan' }).start();

      try {
        const session = await openProjectSession(manifest);
        spinner.text = chalk.white('Waiting for dependencies...');
        const snapshot = await waitForSnapshot(session);
        spinner.stop();

        if (options.json) {
          print(JSON.stringify(snapshotToJson(snapshot), null, 2));
        } else {
          renderSnapshot(snapshot).forEach(line => print(line));
        }

        await closeProjectSession(session);
      } catch (error) {
        spinner.fail(chalk.red(`Failed to build snapshot: ${getErrorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
