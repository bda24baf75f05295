export interface RedmineConfig {
  apiKey: string;
  baseUrl: string;
}

export interface SyncConfig {
  redmine: RedmineConfig;
  csvSource: string;
  projectId: number;
  userId: number;
  delimiter: string;
  dryRun: boolean;
  confirm: boolean;
}
