#!/usr/bin/env node
import { Command } from 'commander';
import { log, loadConfig } from 'waymark-shared';
import { buildRouteSet, formatRouteTable } from './commands/routes.js';
import { generateUrl, parseUrlArgs } from './commands/url.js';
import { isSilent, useColor } from './utils/reporter.js';

const program = new Command();

program
  .name('waymark')
  .description('Inspect route tables and generate URLs')
  .version('0.1.0');

program
  .command('routes')
  .description('Print every configured route with its compiled matcher and static prefix')
  .option('-c, --config <path>', 'Path to config file')
  .option('--no-color', 'Disable colored output')
  .option('--silent', 'Suppress config loading messages')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig({
        configFile: options.config,
        silent: isSilent(process.argv, process.env),
      });
      const routes = buildRouteSet(config);
      console.log(formatRouteTable(routes, { color: useColor(process.argv, process.env) }));
    } catch (error) {
      log.error(`Failed to list routes: ${error}`);
      process.exitCode = 1;
    }
  });

program
  .command('url')
  .description('Generate a URL from a route name and/or key=value params')
  .argument('[args...]', 'route name followed by key=value pairs')
  .option('-c, --config <path>', 'Path to config file')
  .option('--full', 'Print a fully qualified URL')
  .option('--path', 'Print only the path')
  .option('--silent', 'Suppress config loading messages')
  .action(async (args: string[], options: { config?: string; full?: boolean; path?: boolean }) => {
    try {
      const config = await loadConfig({
        configFile: options.config,
        silent: isSilent(process.argv, process.env),
      });
      const routes = buildRouteSet(config);
      const full = options.full ? true : options.path ? false : undefined;
      console.log(generateUrl(routes, config, parseUrlArgs(args), { full }));
    } catch (error) {
      log.error(`Failed to generate URL: ${error}`);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  log.error(String(error));
  process.exitCode = 1;
});
