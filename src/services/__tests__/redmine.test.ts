import { describe, it, expect, beforeEach } from 'vitest';
import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { RedmineService } from '../redmine.js';
import { RemoteError } from '../../errors.js';

type Route = (config: InternalAxiosRequestConfig) => { status: number; data: unknown };

function createClient(route: Route, requests: InternalAxiosRequestConfig[]) {
  return axios.create({
    baseURL: 'https://redmine.test',
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = route(config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
      }
      return response;
    },
  });
}

function apiEntry(id: number, hours: number) {
  return {
    id,
    project: { id: 7, name: 'Website' },
    issue: { id: 101 },
    user: { id: 42, name: 'Test User' },
    activity: { id: 9, name: 'Development' },
    hours,
    comments: '',
    spent_on: '2024-03-04',
  };
}

describe('RedmineService', () => {
  let requests: InternalAxiosRequestConfig[];

  beforeEach(() => {
    requests = [];
  });

  function service(route: Route) {
    return new RedmineService({ apiKey: 'test-key', baseUrl: 'https://redmine.test' }, createClient(route, requests));
  }

  it('lists entries for a project, user and date with the API key header', async () => {
    const redmine = service(() => ({ status: 200, data: { time_entries: [apiEntry(1, 2.5)], total_count: 1 } }));

    const entries = await redmine.listEntries(7, 42, '2024-03-04');

    expect(entries).toEqual([{ id: 1, projectId: 7, userId: 42, spentOn: '2024-03-04', hours: 2.5, activityId: 9 }]);
    expect(requests[0].url).toBe('/time_entries.json');
    expect(requests[0].params).toMatchObject({ project_id: 7, spent_on: '2024-03-04', user_id: 42, offset: 0 });
    expect(requests[0].headers.get('X-Redmine-API-Key')).toBe('test-key');
  });

  it('follows pages until total_count is reached', async () => {
    const all = [apiEntry(1, 1), apiEntry(2, 1), apiEntry(3, 1)];
    const redmine = service((config) => {
      const offset = Number(config.params.offset);
      return { status: 200, data: { time_entries: all.slice(offset, offset + 2), total_count: all.length } };
    });

    const entries = await redmine.listEntries(7, 42, '2024-03-04');

    expect(entries.map(entry => entry.id)).toEqual([1, 2, 3]);
    expect(requests.map(request => request.params.offset)).toEqual([0, 2]);
  });

  it('creates an entry and returns its id', async () => {
    const redmine = service(() => ({ status: 201, data: { time_entry: { id: 555 } } }));

    const id = await redmine.createEntry({
      projectId: 7,
      issueId: 101,
      userId: 42,
      spentOn: '2024-03-04',
      hours: 1.5,
      activityId: 9,
    });

    expect(id).toBe(555);
    expect(requests[0].method).toBe('post');
    expect(JSON.parse(String(requests[0].data))).toEqual({
      time_entry: { project_id: 7, issue_id: 101, user_id: 42, spent_on: '2024-03-04', hours: 1.5, activity_id: 9 },
    });
  });

  it('deletes an entry by id', async () => {
    const redmine = service(() => ({ status: 204, data: '' }));

    await redmine.deleteEntry(12);

    expect(requests[0].method).toBe('delete');
    expect(requests[0].url).toBe('/time_entries/12.json');
  });

  it('builds the activity map from the project', async () => {
    const redmine = service(() => ({
      status: 200,
      data: {
        project: {
          id: 7,
          name: 'Website',
          time_entry_activities: [
            { id: 8, name: 'Design' },
            { id: 9, name: 'Development' },
          ],
        },
      },
    }));

    const activities = await redmine.fetchActivityMap(7);

    expect(requests[0].url).toBe('/projects/7.json');
    expect(requests[0].params).toEqual({ include: 'time_entry_activities' });
    expect([...activities.entries()]).toEqual([
      ['Design', 8],
      ['Development', 9],
    ]);
  });

  it('fails with a RemoteError carrying the status on a non-2xx response', async () => {
    const redmine = service(() => ({ status: 422, data: { errors: ['Activity cannot be blank'] } }));

    const error = await redmine.fetchActivityMap(7).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({
      status: 422,
      message: 'Failed to fetch time entry activities: HTTP 422 {"errors":["Activity cannot be blank"]}',
    });
  });

  it('fails with a RemoteError on an unexpected response body', async () => {
    const redmine = service(() => ({ status: 200, data: { entries: [] } }));

    await expect(redmine.listEntries(7, 42, '2024-03-04')).rejects.toBeInstanceOf(RemoteError);
  });
});
