import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getErrorMessage } from '../../utils/error-utils.js';
import { print } from '../../utils/logger.js';
import { renderSnapshot } from '../render.js';
import { closeProjectSession, openProjectSession } from '../session.js';

export function registerWatchCommand(program: Command): void {
  program
    .command('watch [manifest]')
    .description('Watch a project manifest and print every published dependency snapshot')
    .action(async (manifest: string | undefined): Promise<void> => {
      const spinner = ora({ text: chalk.white('Loading project...'), color: 'cyan' }).start();

      try {
        const session = await openProjectSession(manifest);
        let published = 0;

        session.host.onSnapshotChanged(({ snapshot }) => {
          published++;
          print(chalk.gray(`\n#${published} ${new Date().toISOString()}`));
          renderSnapshot(snapshot).forEach(line => print(line));
        });
        session.host.onSnapshotProviderUnloading(() => {
          print(chalk.yellow('Project unloaded.'));
        });

        await session.project.watch();
        spinner.succeed(chalk.green(`Watching ${session.project.manifestPath}. Press Ctrl+C to stop.`));

        await new Promise<void>(resolve => {
          const shutdown = (): void => {
            process.off('SIGINT', shutdown);
            process.off('SIGTERM', shutdown);
            print('\nStopping watcher...');
            void closeProjectSession(session).then(resolve, error => {
              print(chalk.red(`Failed to stop cleanly: ${getErrorMessage(error)}`));
              resolve();
            });
          };

          process.on('SIGINT', shutdown);
          process.on('SIGTERM', shutdown);
        });
      } catch (error) {
        spinner.fail(chalk.red(`Failed to start watcher: ${getErrorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
