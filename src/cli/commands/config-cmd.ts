import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigSources, getGlobalConfigPath, getProjectConfigPath, loadConfig } from '../../config/loader.js';
import type { DepsnapConfig } from '../../config/types.js';
import { print } from '../../utils/logger.js';

function displayConfig(config: DepsnapConfig | null, title: string): void {
  if (!config || Object.keys(config).length === 0) {
    print(chalk.gray(`  ${title}: (empty)`));
    return;
  }
  print(chalk.bold(`  ${title}:`));
  print(JSON.stringify(config, null, 2).split('\n').map(line => `    ${line}`).join('\n'));
}

export function registerConfigCommand(program: Command): void {
  program
    .command('config [path]')
    .description('Show the effective configuration for a project directory')
    .option('-s, --sources', 'show every configuration source')
    .action((basePath: string = '.', options: { sources?: boolean }) => {
      if (options.sources) {
        const sources = getConfigSources(basePath);
        print(chalk.bold('Configuration Sources:\n'));
        displayConfig(sources.global, `Global (${getGlobalConfigPath()})`);
        displayConfig(sources.project, `Project (${getProjectConfigPath(basePath)})`);
        displayConfig(sources.env, 'Environment Variables');
        print('');
        print(chalk.gray('Priority: Environment > Project > Global'));
        return;
      }

      print(chalk.bold('Merged Configuration:\n'));
      print(JSON.stringify(loadConfig(basePath), null, 2));
      print('');
      print(chalk.gray('Tip: Use --sources to see individual config sources'));
    });
}
