import inquirer from 'inquirer';
import { SyncConfig } from './types/config.js';
import { Logger } from './types/timesheet.js';
import { ReconciliationPlan, ReconciliationReport } from './types/reconciliation.js';
import { CsvLoader } from './services/csv.js';
import { RedmineService, TimeEntryGateway } from './services/redmine.js';
import { ReconciliationEngine } from './services/reconciliation.js';

export interface SyncDependencies {
  gateway?: TimeEntryGateway;
  loader?: CsvLoader;
  confirmClean?: (plan: ReconciliationPlan) => Promise<boolean>;
  logger?: Logger;
}

async function promptConfirmClean(plan: ReconciliationPlan): Promise<boolean> {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: `Delete ${plan.remoteCount} remote time entries and re-create ${plan.csvCount} from the CSV?`,
      default: false,
    },
  ]);
  return confirm;
}

export async function runSync(config: SyncConfig, deps: SyncDependencies = {}): Promise<ReconciliationReport> {
  const logger = deps.logger ?? console;
  const loader = deps.loader ?? new CsvLoader(logger);
  const gateway = deps.gateway ?? new RedmineService(config.redmine);

  logger.log(`Loading time records from ${config.csvSource}...`);
  const records = await loader.loadRecords(config.csvSource, { delimiter: config.delimiter });
  logger.log(`Loaded ${records.length} valid rows.`);

  const engine = new ReconciliationEngine(
    gateway,
    {
      projectId: config.projectId,
      userId: config.userId,
      dryRun: config.dryRun,
      confirmClean: config.confirm ? deps.confirmClean ?? promptConfirmClean : undefined,
    },
    logger
  );

  return engine.run(records);
}
