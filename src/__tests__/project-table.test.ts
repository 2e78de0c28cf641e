import { describe, it, expect, vi, beforeEach } from 'vitest';
import { API, SELF_MANAGED, createMockProject, jsonResponse } from './fixtures.js';
import { createGitLabPlugin } from '../tables/index.js';
import { createLogger } from '../logging/logger.js';
import { GitLabClientError } from '../gitlab/client.js';
import { ConfigurationError } from '../types/config.js';
import type { Row } from '../plugin/types.js';

// Mock fetch for REST API calls
const mockFetch = vi.fn();
global.fetch = mockFetch;

describe('gitlab_project', () => {
  const plugin = createGitLabPlugin(createLogger('test', 'silent'));
  let rows: Row[];
  const sink = (row: Row): void => {
    rows.push(row);
  };

  beforeEach(() => {
    vi.clearAllMocks();
    rows = [];
  });

  describe('list', () => {
    it('streams every project across all pages', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse([createMockProject(1), createMockProject(2)], { nextPage: 2 }))
        .mockResolvedValueOnce(jsonResponse([createMockProject(3)], { nextPage: 3 }))
        .mockResolvedValueOnce(jsonResponse([createMockProject(4)]));

      const count = await plugin.query('gitlab_project', {}, SELF_MANAGED, sink);

      expect(count).toBe(4);
      expect(rows.map((r) => r.id)).toEqual([1, 2, 3, 4]);
      expect(mockFetch.mock.calls.map((c) => c[0])).toEqual([
        `${API}projects?page=1&per_page=50`,
        `${API}projects?page=2&per_page=50`,
        `${API}projects?page=3&per_page=50`,
      ]);
    });

    it('maps fields to columns', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([
        createMockProject(1, {
          marked_for_deletion_at: '2024-05-01',
          owner: { id: 21, username: 'carol' },
          namespace: { id: 21, name: 'carol', path: 'carol', kind: 'user', full_path: 'carol' },
          permissions: {
            project_access: { access_level: 30 },
            group_access: { access_level: 40 },
          },
        }),
      ]));

      await plugin.query('gitlab_project', {}, SELF_MANAGED, sink);

      expect(rows[0]).toMatchObject({
        id: 1,
        name: 'App 1',
        full_name: 'Platform / App 1',
        full_path: 'platform/app-1',
        visibility: 'internal',
        topics: ['backend'],
        star_count: 12,
        owner_id: 21,
        owner_username: 'carol',
        namespace_kind: 'user',
        namespace_full_path: 'carol',
        access_level: 'Maintainer',
        created_at: new Date('2023-06-01T10:00:00.000Z'),
        marked_for_deletion_at: new Date('2024-05-01T00:00:00.000Z'),
      });
    });

    it('leaves group-owned and absent fields null', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([createMockProject(1)]));

      await plugin.query('gitlab_project', {}, SELF_MANAGED, sink);

      expect(rows[0]).toMatchObject({
        owner_id: null,
        owner_username: null,
        marked_for_deletion_at: null,
        access_level: null,
        public: null,
        namespace_kind: 'group',
      });
    });

    it('translates archived and visibility quals into upstream filters', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([createMockProject(1, { visibility: 'public' })]));

      await plugin.query('gitlab_project', { visibility: 'public', archived: false }, SELF_MANAGED, sink);

      expect(mockFetch.mock.calls[0][0]).toBe(`${API}projects?archived=false&visibility=public&page=1&per_page=50`);
      expect(rows).toHaveLength(1);
    });

    it('filters rows on columns without an upstream filter', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([
        createMockProject(1, { default_branch: 'main' }),
        createMockProject(2, { default_branch: 'master' }),
      ]));

      await plugin.query('gitlab_project', { default_branch: 'master' }, SELF_MANAGED, sink);

      expect(mockFetch.mock.calls[0][0]).toBe(`${API}projects?page=1&per_page=50`);
      expect(rows.map((r) => r.id)).toEqual([2]);
    });

    it('stops paging once the limit is reached', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse([createMockProject(1), createMockProject(2), createMockProject(3)], { nextPage: 2 })
      );

      const count = await plugin.query('gitlab_project', {}, SELF_MANAGED, sink, { limit: 2 });

      expect(count).toBe(2);
      expect(rows.map((r) => r.id)).toEqual([1, 2]);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('makes no request with a limit of 0', async () => {
      const count = await plugin.query('gitlab_project', {}, SELF_MANAGED, sink, { limit: 0 });

      expect(count).toBe(0);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('aborts on an upstream error', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse([createMockProject(1)], { nextPage: 2 }))
        .mockResolvedValueOnce(jsonResponse({ message: '401 Unauthorized' }, { status: 401 }));

      await expect(plugin.query('gitlab_project', {}, SELF_MANAGED, sink)).rejects.toThrow(
        `GET ${API}projects?page=2&per_page=50: 401 401 Unauthorized`
      );
      expect(rows.map((r) => r.id)).toEqual([1]);
    });

    it('fails on missing settings before any request', async () => {
      await expect(
        plugin.query('gitlab_project', {}, { baseUrl: 'https://gitlab.example.com', token: '' }, sink)
      ).rejects.toThrow(ConfigurationError);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('get', () => {
    it('fetches a single project by id', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(createMockProject(42)));

      const count = await plugin.query('gitlab_project', { id: 42 }, SELF_MANAGED, sink);

      expect(count).toBe(1);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch.mock.calls[0][0]).toBe(`${API}projects/42`);
      expect(rows[0]).toMatchObject({ id: 42, full_path: 'platform/app-42' });
    });

    it('propagates the upstream not-found error', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: '404 Project Not Found' }, { status: 404 }));

      const error = await plugin.query('gitlab_project', { id: 999 }, SELF_MANAGED, sink).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitLabClientError);
      expect(error).toMatchObject({
        message: `GET ${API}projects/999: 404 404 Project Not Found`,
        statusCode: 404,
      });
      expect(rows).toEqual([]);
    });
  });
});
