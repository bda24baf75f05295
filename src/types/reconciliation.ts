export type ReconciliationAction = 'none' | 'clean-rebuild' | 'append';

export interface DateComparison {
  date: string;
  localHours: number;
  remoteHours: number;
  remoteCount: number;
  matches: boolean;
}

export interface HoursComparison {
  matches: boolean;
  remoteCount: number;
  dates: DateComparison[];
}

export interface ReconciliationPlan {
  action: ReconciliationAction;
  hoursMatch: boolean;
  csvCount: number;
  remoteCount: number;
  difference: number;
  skipRows: number;
}

export interface ReconciliationReport {
  plan: ReconciliationPlan;
  deleted: number;
  created: number;
  skipped: number;
  aborted: boolean;
  verified: boolean | null;
}
