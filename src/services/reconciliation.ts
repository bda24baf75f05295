import { ActivityMap, Logger, TimeRecord } from '../types/timesheet.js';
import {
  DateComparison,
  HoursComparison,
  ReconciliationPlan,
  ReconciliationReport,
} from '../types/reconciliation.js';
import { TimeEntryGateway } from './redmine.js';
import { distinctDates } from './csv.js';
import { ExitCode, SyncError, errorMessage } from '../errors.js';

const HOURS_TOLERANCE = 0.001;

export interface ReconciliationOptions {
  projectId: number;
  userId: number;
  dryRun?: boolean;
  /** Asked before remote entries are deleted; resolving false aborts the run. */
  confirmClean?: (plan: ReconciliationPlan) => Promise<boolean>;
}

function sumHours(values: number[]): number {
  return values.reduce((total, hours) => total + hours, 0);
}

/**
 * Decides what to do from the hours comparison and the entry counts.
 */
export function planReconciliation(hoursMatch: boolean, csvCount: number, remoteCount: number): ReconciliationPlan {
  const difference = remoteCount - csvCount;
  const base = { hoursMatch, csvCount, remoteCount, difference };

  if (difference < 0) {
    return { ...base, action: 'append', skipRows: remoteCount };
  }
  if (difference > 0 || !hoursMatch) {
    return { ...base, action: 'clean-rebuild', skipRows: 0 };
  }
  return { ...base, action: 'none', skipRows: 0 };
}

export class ReconciliationEngine {
  constructor(
    private gateway: TimeEntryGateway,
    private options: ReconciliationOptions,
    private logger: Logger = console
  ) {}

  async run(records: TimeRecord[]): Promise<ReconciliationReport> {
    const dates = distinctDates(records);

    this.logger.log(`Comparing ${records.length} CSV rows across ${dates.length} date(s)...`);
    const comparison = await this.guard(ExitCode.REMOTE_COUNT_FAILED, () => this.compareHours(records, dates));
    const plan = planReconciliation(comparison.matches, records.length, comparison.remoteCount);
    const report: ReconciliationReport = { plan, deleted: 0, created: 0, skipped: 0, aborted: false, verified: null };

    this.logger.log(
      `Remote entries: ${plan.remoteCount}, CSV rows: ${plan.csvCount}, ` +
      `difference: ${plan.difference}, hours ${plan.hoursMatch ? 'match' : 'differ'}`
    );

    if (plan.action === 'none') {
      this.logger.log('✓ Remote time entries already match the CSV. Nothing to do.');
      return report;
    }

    if (this.options.dryRun) {
      this.logger.log(`Dry run: would ${this.describe(plan)}.`);
      return report;
    }

    if (plan.action === 'clean-rebuild') {
      if (this.options.confirmClean && !(await this.options.confirmClean(plan))) {
        this.logger.log('Synchronization cancelled.');
        return { ...report, aborted: true };
      }
      report.deleted = await this.guard(ExitCode.REMOTE_CLEAN_FAILED, () => this.cleanRemote(dates));
    }

    const activities = await this.guard(ExitCode.ACTIVITY_MAP_FAILED, () =>
      this.gateway.fetchActivityMap(this.options.projectId)
    );
    const rebuilt = await this.guard(ExitCode.REMOTE_CREATE_FAILED, () =>
      this.rebuild(records.slice(plan.skipRows), activities)
    );
    report.created = rebuilt.created;
    report.skipped = rebuilt.skipped;

    this.logger.log('Verifying remote hours...');
    const verification = await this.guard(ExitCode.REMOTE_COUNT_FAILED, () => this.compareHours(records, dates));
    report.verified = verification.matches;
    if (verification.matches) {
      this.logger.log('✓ Remote hours match the CSV.');
    } else {
      this.logger.warn('⚠️ Remote hours still differ from the CSV after synchronization.');
    }

    this.logger.log(`\nSynchronization completed: ${report.deleted} deleted, ${report.created} created, ${report.skipped} skipped.`);
    return report;
  }

  /**
   * Compares CSV and remote hours per date. Matches only if every date matches.
   */
  async compareHours(records: TimeRecord[], dates: string[] = distinctDates(records)): Promise<HoursComparison> {
    const results: DateComparison[] = [];

    for (const date of dates) {
      const localHours = sumHours(records.filter(record => record.date === date).map(record => record.hours));
      const remote = await this.gateway.listEntries(this.options.projectId, this.options.userId, date);
      const remoteHours = sumHours(remote.map(entry => entry.hours));
      const matches = Math.abs(localHours - remoteHours) < HOURS_TOLERANCE;

      if (!matches) {
        this.logger.log(`  ${date}: CSV ${localHours}h, remote ${remoteHours}h`);
      }
      results.push({ date, localHours, remoteHours, remoteCount: remote.length, matches });
    }

    return {
      matches: results.every(result => result.matches),
      remoteCount: results.reduce((total, result) => total + result.remoteCount, 0),
      dates: results,
    };
  }

  private async cleanRemote(dates: string[]): Promise<number> {
    let deleted = 0;
    for (const date of dates) {
      const entries = await this.gateway.listEntries(this.options.projectId, this.options.userId, date);
      for (const entry of entries) {
        await this.gateway.deleteEntry(entry.id);
        deleted++;
      }
      this.logger.log(`✓ Removed ${entries.length} remote entries for ${date}`);
    }
    return deleted;
  }

  private async rebuild(
    records: TimeRecord[],
    activities: ActivityMap
  ): Promise<{ created: number; skipped: number }> {
    let created = 0;
    let skipped = 0;

    for (const record of records) {
      const activityId = activities.get(record.activityName);
      if (activityId === undefined) {
        this.logger.warn(`⚠️ No activity found for "${record.activityName}" (CSV line ${record.line}), skipping`);
        skipped++;
        continue;
      }

      const id = await this.gateway.createEntry({
        projectId: this.options.projectId,
        issueId: record.issueId,
        userId: this.options.userId,
        spentOn: record.date,
        hours: record.hours,
        activityId,
      });
      this.logger.log(`✓ Created entry ${id}: ${record.date} #${record.issueId} - ${record.hours}h (${record.activityName})`);
      created++;
    }

    return { created, skipped };
  }

  private describe(plan: ReconciliationPlan): string {
    if (plan.action === 'append') {
      return `append ${plan.csvCount - plan.skipRows} entries, skipping the first ${plan.skipRows} CSV rows`;
    }
    return `delete ${plan.remoteCount} remote entries and create ${plan.csvCount}`;
  }

  private async guard<T>(exitCode: ExitCode, step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (error) {
      throw new SyncError(errorMessage(error), exitCode, error);
    }
  }
}
