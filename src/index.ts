#!/usr/bin/env node
import { Command } from 'commander';
import { config } from 'dotenv';
import { loadConfig, SyncOptions } from './config.js';
import { runSync } from './sync.js';
import { ExitCode, errorMessage, exitCodeFor } from './errors.js';

config();

const program = new Command();

program
  .name('timesheet-sync')
  .description('CLI tool to reconcile Redmine time entries with a spreadsheet export')
  .version('1.0.0');

program
  .command('sync', { isDefault: true })
  .description('Make the remote time entries of one project and user match the CSV')
  .option('-k, --api-key <key>', 'Redmine API key (REDMINE_API_KEY)')
  .option('-u, --url <url>', 'Redmine base URL (REDMINE_URL)')
  .option('-c, --csv <path>', 'CSV file path or http(s) URL (TIMESHEET_CSV)')
  .option('-p, --project <id>', 'Redmine project id (REDMINE_PROJECT_ID)')
  .option('--user <id>', 'Redmine user id (REDMINE_USER_ID)')
  .option('-d, --delimiter <char>', 'CSV field delimiter', ',')
  .option('--dry-run', 'Report the planned action without changing remote data')
  .option('--confirm', 'Ask before deleting remote entries')
  .action(async (options: SyncOptions) => {
    try {
      const settings = loadConfig(options);
      await runSync(settings);
      process.exit(ExitCode.SUCCESS);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(exitCodeFor(error));
    }
  });

await program.parseAsync();
