import { fetch, ProxyAgent, type Dispatcher, type Response } from 'undici';
import { z } from 'zod';
import type { SyncConfig } from './config.js';
import type {
  JamaCreateItemRequest,
  JamaItem,
  JamaPage,
  JamaProject,
  JamaTransport,
} from '../types/jama.js';
import { TOKEN_EXPIRY_MARGIN_MS } from '../constants.js';
import { NotFoundError, RemoteError, TransportError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const tokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
});

const itemSchema = z.object({
  id: z.number(),
  itemType: z.number().optional(),
  childItemType: z.number().optional(),
  location: z
    .object({
      sequence: z.string().optional(),
      parent: z
        .object({
          item: z.number().optional(),
          project: z.number().optional(),
        })
        .optional(),
    })
    .optional(),
  fields: z.record(z.unknown()).default({}),
  createdDate: z.string().optional(),
  modifiedDate: z.string().optional(),
});

const pageSchema = z.object({
  meta: z
    .object({
      pageInfo: z
        .object({
          startIndex: z.number(),
          resultCount: z.number(),
          totalResults: z.number(),
        })
        .optional(),
    })
    .optional(),
  data: z.array(itemSchema).default([]),
});

const projectSchema = z.object({
  data: z.object({
    id: z.number(),
    fields: z.object({ name: z.string().default('') }).passthrough(),
  }),
});

const createdSchema = z.object({
  meta: z.object({ id: z.number() }),
});

export interface JamaClientOptions {
  fetch?: typeof fetch;
  now?: () => number;
}

interface RequestInput {
  method: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * REST client for the Jama API. Authenticates with the OAuth
 * client-credentials flow and keeps the token until shortly before expiry.
 */
export class JamaClient implements JamaTransport {
  private accessToken: string | undefined;
  private tokenExpiresAt = 0;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly config: SyncConfig, options: JamaClientOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    const proxy = config.base_url.startsWith('https:') ? config.proxies?.https : config.proxies?.http;
    this.dispatcher = proxy ? new ProxyAgent(proxy) : undefined;
  }

  async getProject(): Promise<JamaProject> {
    const body = await this.call('GET', `/rest/v1/projects/${this.config.project_id}`);
    const parsed = this.parse(projectSchema, body, 'project');
    return { id: parsed.data.id, name: parsed.data.fields.name };
  }

  async listItems(startAt: number, maxResults: number): Promise<JamaPage<JamaItem>> {
    const body = await this.call('GET', '/rest/v1/items', {
      query: { project: this.config.project_id, startAt, maxResults },
    });
    const parsed = this.parse(pageSchema, body, 'item page');
    const pageInfo = parsed.meta?.pageInfo ?? {
      startIndex: startAt,
      resultCount: parsed.data.length,
      totalResults: startAt + parsed.data.length,
    };
    return { data: parsed.data, pageInfo };
  }

  async createItem(request: JamaCreateItemRequest): Promise<number> {
    const body = await this.call('POST', '/rest/v1/items', { json: request });
    return this.parse(createdSchema, body, 'create response').meta.id;
  }

  async updateItem(id: number, fields: Record<string, string>): Promise<void> {
    const operations = Object.entries(fields).map(([key, value]) => ({
      op: 'replace',
      path: `/fields/${key}`,
      value,
    }));
    await this.call('PATCH', `/rest/v1/items/${id}`, { json: operations });
  }

  async deleteItem(id: number): Promise<void> {
    await this.call('DELETE', `/rest/v1/items/${id}`);
  }

  private async getAccessToken(): Promise<string> {
    if (this.accessToken && this.now() < this.tokenExpiresAt) {
      return this.accessToken;
    }

    logger.debug('Requesting a new access token');
    const credentials = Buffer.from(`${this.config.api_id}:${this.config.api_secret}`).toString('base64');
    const response = await this.request(this.buildUrl('/rest/oauth/token'), {
      method: 'POST',
      headers: {
        Authorization: `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: 'grant_type=client_credentials',
    });

    if (!response.ok) {
      // drain the body so the connection goes back to the pool
      await response.text();
      throw new TransportError(`OAuth authentication failed (HTTP ${response.status})`, {
        transient: response.status >= 500,
      });
    }

    const parsed = tokenSchema.safeParse(await this.readJson(response, 'token'));
    if (!parsed.success) {
      throw new TransportError('OAuth token response is missing access_token', { cause: parsed.error });
    }

    this.accessToken = parsed.data.access_token;
    this.tokenExpiresAt = this.now() + parsed.data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS;
    return this.accessToken;
  }

  private async call(
    method: string,
    path: string,
    options: { query?: Record<string, string | number>; json?: unknown } = {},
  ): Promise<unknown> {
    const token = await this.getAccessToken();
    const response = await this.request(this.buildUrl(path, options.query), {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: options.json === undefined ? undefined : JSON.stringify(options.json),
    });

    if (!response.ok) {
      const text = await response.text();
      throw toHttpError(`${method} ${path}`, response.status, text);
    }
    return this.readJson(response, `${method} ${path}`);
  }

  private async request(url: string, input: RequestInput): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        ...input,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.config.request_timeout_ms),
      });
    } catch (err) {
      throw new TransportError(`${input.method} ${url} failed: ${errorMessage(err)}`, {
        transient: true,
        cause: err,
      });
    }
  }

  private async readJson(response: Response, label: string): Promise<unknown> {
    const text = await response.text();
    // DELETE and some PATCH responses have no body
    if (!text) return undefined;
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new RemoteError(`Invalid JSON in ${label} response`, { status: response.status, cause: err });
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, label: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new RemoteError(`Unexpected ${label} format`, { cause: result.error });
    }
    return result.data;
  }

  private buildUrl(path: string, query?: Record<string, string | number>): string {
    const url = new URL(path, this.config.base_url);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }
}

/**
 * Map an HTTP failure onto the error taxonomy. Auth failures are transport
 * problems; 429 and 5xx are worth retrying; other 4xx reject the item.
 */
export function toHttpError(label: string, status: number, body: string): Error {
  const detail = body ? `: ${body.slice(0, 200)}` : '';
  const message = `${label} returned HTTP ${status}${detail}`;
  if (status === 404) return new NotFoundError(message);
  if (status === 401 || status === 403) return new TransportError(message);
  if (status === 429 || status >= 500) return new RemoteError(message, { status, transient: true });
  return new RemoteError(message, { status });
}
