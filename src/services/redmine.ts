import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { RedmineConfig } from '../types/config.js';
import { ActivityMap, NewTimeEntry, RemoteTimeEntry } from '../types/timesheet.js';
import { RemoteError, errorMessage } from '../errors.js';

const PAGE_SIZE = 100;

const timeEntrySchema = z.object({
  id: z.number(),
  project: z.object({ id: z.number() }),
  user: z.object({ id: z.number() }),
  activity: z.object({ id: z.number() }),
  spent_on: z.string(),
  hours: z.number(),
});

const timeEntryListSchema = z.object({
  time_entries: z.array(timeEntrySchema),
  total_count: z.number().optional(),
});

const createdEntrySchema = z.object({
  time_entry: z.object({ id: z.number() }),
});

const projectActivitiesSchema = z.object({
  project: z.object({
    time_entry_activities: z.array(z.object({ id: z.number(), name: z.string() })).default([]),
  }),
});

/**
 * The remote operations the reconciliation engine needs.
 */
export interface TimeEntryGateway {
  listEntries(projectId: number, userId: number, date: string): Promise<RemoteTimeEntry[]>;
  createEntry(fields: NewTimeEntry): Promise<number>;
  deleteEntry(id: number): Promise<void>;
  fetchActivityMap(projectId: number): Promise<ActivityMap>;
}

export class RedmineService implements TimeEntryGateway {
  private client: AxiosInstance;

  constructor(config: RedmineConfig, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: config.baseUrl.replace(/\/+$/, ''),
      headers: {
        'User-Agent': 'Timesheet Sync Tool',
        'Content-Type': 'application/json',
      },
    });

    this.client.interceptors.request.use((request) => {
      request.headers['X-Redmine-API-Key'] = config.apiKey;
      return request;
    });
  }

  async listEntries(projectId: number, userId: number, date: string): Promise<RemoteTimeEntry[]> {
    const entries: RemoteTimeEntry[] = [];
    let offset = 0;

    while (true) {
      const data = await this.request('fetch time entries', () =>
        this.client.get('/time_entries.json', {
          params: {
            project_id: projectId,
            spent_on: date,
            user_id: userId,
            offset,
            limit: PAGE_SIZE,
          },
        })
      );
      const page = this.parse('fetch time entries', timeEntryListSchema, data);

      for (const entry of page.time_entries) {
        entries.push({
          id: entry.id,
          projectId: entry.project.id,
          userId: entry.user.id,
          spentOn: entry.spent_on,
          hours: entry.hours,
          activityId: entry.activity.id,
        });
      }

      offset += page.time_entries.length;
      const total = page.total_count ?? offset;
      if (page.time_entries.length === 0 || offset >= total) {
        return entries;
      }
    }
  }

  async createEntry(fields: NewTimeEntry): Promise<number> {
    const data = await this.request('create time entry', () =>
      this.client.post('/time_entries.json', {
        time_entry: {
          project_id: fields.projectId,
          issue_id: fields.issueId,
          user_id: fields.userId,
          spent_on: fields.spentOn,
          hours: fields.hours,
          activity_id: fields.activityId,
        },
      })
    );
    return this.parse('create time entry', createdEntrySchema, data).time_entry.id;
  }

  async deleteEntry(id: number): Promise<void> {
    await this.request(`delete time entry ${id}`, () => this.client.delete(`/time_entries/${id}.json`));
  }

  async fetchActivityMap(projectId: number): Promise<ActivityMap> {
    const data = await this.request('fetch time entry activities', () =>
      this.client.get(`/projects/${projectId}.json`, {
        params: { include: 'time_entry_activities' },
      })
    );
    const { project } = this.parse('fetch time entry activities', projectActivitiesSchema, data);
    return new Map(project.time_entry_activities.map(activity => [activity.name, activity.id]));
  }

  private async request(action: string, call: () => Promise<{ data: unknown }>): Promise<unknown> {
    try {
      const response = await call();
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const details = error.response?.data
          ? typeof error.response.data === 'string'
            ? error.response.data
            : JSON.stringify(error.response.data)
          : error.message;
        throw new RemoteError(
          `Failed to ${action}: ${status ? `HTTP ${status} ` : ''}${details}`,
          status,
          error
        );
      }
      throw new RemoteError(`Failed to ${action}: ${errorMessage(error)}`, undefined, error);
    }
  }

  private parse<T extends z.ZodTypeAny>(action: string, schema: T, data: unknown): z.output<T> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new RemoteError(`Failed to ${action}: unexpected response (${result.error.message})`);
    }
    return result.data;
  }
}
