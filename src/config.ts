import { SyncConfig } from './types/config.js';
import { ConfigError } from './errors.js';

export interface SyncOptions {
  apiKey?: string;
  url?: string;
  csv?: string;
  project?: string;
  user?: string;
  delimiter?: string;
  dryRun?: boolean;
  confirm?: boolean;
}

type Env = Record<string, string | undefined>;

function parseId(value: string, label: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ConfigError(`Invalid ${label}: "${value}" is not a positive integer`);
  }
  return id;
}

/**
 * Merges command-line options with environment variables. Options win.
 */
export function loadConfig(options: SyncOptions, env: Env = process.env): SyncConfig {
  const values = {
    apiKey: (options.apiKey || env.REDMINE_API_KEY || '').trim(),
    baseUrl: (options.url || env.REDMINE_URL || '').trim(),
    csvSource: (options.csv || env.TIMESHEET_CSV || '').trim(),
    project: (options.project || env.REDMINE_PROJECT_ID || '').trim(),
    user: (options.user || env.REDMINE_USER_ID || '').trim(),
  };

  const missing = [
    { value: values.apiKey, label: '--api-key (REDMINE_API_KEY)' },
    { value: values.baseUrl, label: '--url (REDMINE_URL)' },
    { value: values.csvSource, label: '--csv (TIMESHEET_CSV)' },
    { value: values.project, label: '--project (REDMINE_PROJECT_ID)' },
    { value: values.user, label: '--user (REDMINE_USER_ID)' },
  ]
    .filter(param => !param.value)
    .map(param => param.label);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required parameters: ${missing.join(', ')}`);
  }

  return {
    redmine: { apiKey: values.apiKey, baseUrl: values.baseUrl },
    csvSource: values.csvSource,
    projectId: parseId(values.project, 'project id'),
    userId: parseId(values.user, 'user id'),
    delimiter: options.delimiter || ',',
    dryRun: options.dryRun ?? false,
    confirm: options.confirm ?? false,
  };
}
