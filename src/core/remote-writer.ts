import { retryOptionsFromConfig, type SyncConfig } from './config.js';
import type { CanonicalField, JamaCreateItemRequest, JamaTransport } from '../types/jama.js';
import { toRemoteFields } from './field-mapper.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

export type FieldValues = Partial<Record<CanonicalField, string>>;

export interface CreateRequest {
  name: string;
  fields: FieldValues;
  parentId?: number;
}

export interface RemoteWriterOptions {
  projectId: number;
  fieldKeys?: Partial<Record<CanonicalField, string>>;
  itemTypes?: { default: number; child: number };
  retry?: RetryOptions;
}

export function writerOptionsFromConfig(config: SyncConfig): RemoteWriterOptions {
  return {
    projectId: config.project_id,
    fieldKeys: config.fields,
    itemTypes: config.item_types,
    retry: retryOptionsFromConfig(config),
  };
}

/**
 * Issues the three write operations against the remote store. Transient
 * failures are retried with backoff; everything else surfaces at once.
 */
export class RemoteWriter {
  constructor(
    private readonly transport: JamaTransport,
    private readonly options: RemoteWriterOptions,
  ) {}

  /** Returns the id the remote store assigned */
  async create(request: CreateRequest): Promise<number> {
    const { projectId } = this.options;
    const itemTypes = this.options.itemTypes ?? { default: 1, child: 1 };
    const body: JamaCreateItemRequest = {
      project: projectId,
      itemType: itemTypes.default,
      childItemType: itemTypes.child,
      location: { parent: { item: request.parentId, project: projectId } },
      fields: toRemoteFields({ ...request.fields, name: request.name }, this.options.fieldKeys ?? {}),
    };
    logger.debug(`Create payload: ${JSON.stringify(body)}`);
    return withRetry(() => this.transport.createItem(body), `Create "${request.name}"`, this.options.retry);
  }

  async update(id: number, fields: FieldValues): Promise<void> {
    const remote = toRemoteFields(fields, this.options.fieldKeys ?? {});
    logger.debug(`Update ${id}: ${Object.keys(remote).join(', ')}`);
    await withRetry(() => this.transport.updateItem(id, remote), `Update ${id}`, this.options.retry);
  }

  async delete(id: number): Promise<void> {
    await withRetry(() => this.transport.deleteItem(id), `Delete ${id}`, this.options.retry);
  }
}
