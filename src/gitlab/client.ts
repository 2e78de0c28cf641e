import { GraphQLClient, ClientError } from 'graphql-request';
import type {
  GitLabProject,
  GitLabIssue,
  ListProjectsOptions,
  ListIssuesOptions,
  Page,
  CurrentUserResponse,
} from './types.js';
import { CURRENT_USER } from './queries.js';

const API_VERSION_PATH = 'api/v4/';
const GRAPHQL_PATH = 'api/graphql';

export interface GitLabClientOptions {
  token: string;
  baseUrl: string;
}

export class GitLabClientError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'GitLabClientError';
  }
}

/**
 * Append the REST API version path to an instance address unless it is already there
 */
export function normalizeApiBaseUrl(baseUrl: string): string {
  let url = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  if (!url.endsWith(API_VERSION_PATH)) {
    url += API_VERSION_PATH;
  }
  return url;
}

/**
 * Read the next page number from the pagination headers, 0 when there is none
 */
export function parseNextPage(headers: Headers): number {
  const raw = headers.get('x-next-page');
  if (!raw) {
    return 0;
  }
  const page = Number.parseInt(raw, 10);
  return Number.isNaN(page) ? 0 : page;
}

/**
 * Build a query string from an options object, skipping unset values
 */
export function toQueryString<T extends object>(params: T): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

/**
 * GitLab REST client authenticated with a private/personal access token
 */
export class GitLabClient {
  private token: string;
  private apiBaseUrl: string;
  private graphqlUrl: string;

  constructor(options: GitLabClientOptions) {
    this.token = options.token;
    this.apiBaseUrl = normalizeApiBaseUrl(options.baseUrl);
    this.graphqlUrl = this.apiBaseUrl.slice(0, -API_VERSION_PATH.length) + GRAPHQL_PATH;
  }

  get baseUrl(): string {
    return this.apiBaseUrl;
  }

  /**
   * Validate the token by resolving the current user over GraphQL
   */
  async validateToken(): Promise<{ username: string }> {
    const client = new GraphQLClient(this.graphqlUrl, {
      headers: {
        authorization: `Bearer ${this.token}`,
      },
    });

    let response: CurrentUserResponse;
    try {
      response = await client.request<CurrentUserResponse>(CURRENT_USER);
    } catch (error) {
      throw this.wrapGraphQLError(error);
    }

    if (!response.currentUser) {
      throw new GitLabClientError('Token is not valid for this GitLab instance', 401);
    }

    return { username: response.currentUser.username };
  }

  /**
   * List one page of projects visible to the token
   */
  async listProjects(options: ListProjectsOptions): Promise<Page<GitLabProject>> {
    return this.getPage<GitLabProject>('projects', options);
  }

  /**
   * Get a single project by numeric ID
   */
  async getProject(id: number): Promise<GitLabProject> {
    const { data } = await this.get<GitLabProject>(`projects/${id}`);
    return data;
  }

  /**
   * List one page of issues across the instance
   */
  async listIssues(options: ListIssuesOptions): Promise<Page<GitLabIssue>> {
    return this.getPage<GitLabIssue>('issues', options);
  }

  /**
   * List one page of issues belonging to a single project
   */
  async listProjectIssues(projectId: number, options: ListIssuesOptions): Promise<Page<GitLabIssue>> {
    return this.getPage<GitLabIssue>(`projects/${projectId}/issues`, options);
  }

  private async getPage<T>(path: string, options: object): Promise<Page<T>> {
    const { data, headers } = await this.get<T[]>(`${path}${toQueryString(options)}`);
    return { items: data, nextPage: parseNextPage(headers) };
  }

  private async get<T>(path: string): Promise<{ data: T; headers: Headers }> {
    const url = `${this.apiBaseUrl}${path}`;

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'PRIVATE-TOKEN': this.token,
          Accept: 'application/json',
        },
      });
    } catch (error) {
      throw new GitLabClientError(
        `GET ${url}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      const detail = await this.readErrorDetail(response);
      throw new GitLabClientError(`GET ${url}: ${response.status} ${detail}`, response.status);
    }

    const data = await response.json() as T;
    return { data, headers: response.headers };
  }

  /**
   * Extract the upstream error message from a failed response
   */
  private async readErrorDetail(response: Response): Promise<string> {
    const text = await response.text();
    if (!text) {
      return response.statusText;
    }

    try {
      const body: unknown = JSON.parse(text);
      if (typeof body === 'object' && body !== null) {
        if ('message' in body) {
          return typeof body.message === 'string' ? body.message : JSON.stringify(body.message);
        }
        if ('error' in body && typeof body.error === 'string') {
          return body.error;
        }
      }
    } catch {
      return text;
    }

    return text;
  }

  private wrapGraphQLError(error: unknown): GitLabClientError {
    if (error instanceof ClientError) {
      const status = error.response.status;
      const message = error.response.errors?.[0]?.message ?? error.message;
      return new GitLabClientError(`POST ${this.graphqlUrl}: ${status} ${message}`, status);
    }

    if (error instanceof Error) {
      return new GitLabClientError(`POST ${this.graphqlUrl}: ${error.message}`);
    }

    return new GitLabClientError('Unknown error occurred');
  }
}
