import type { CANONICAL_FIELDS, EDITABLE_FIELDS } from '../constants.js';

export type CanonicalField = typeof CANONICAL_FIELDS[number];
export type EditableField = typeof EDITABLE_FIELDS[number];

export type ItemKind = 'SYSP' | 'Requirement';

/**
 * An item as the REST API returns it
 */
export interface JamaItem {
  id: number;
  itemType?: number;
  childItemType?: number;
  location?: {
    sequence?: string;
    parent?: { item?: number; project?: number };
  };
  fields: Record<string, unknown>;
  createdDate?: string;
  modifiedDate?: string;
}

export interface JamaPageInfo {
  startIndex: number;
  resultCount: number;
  totalResults: number;
}

export interface JamaPage<T> {
  data: T[];
  pageInfo: JamaPageInfo;
}

export interface JamaProject {
  id: number;
  name: string;
}

export interface JamaCreateItemRequest {
  project: number;
  itemType: number;
  childItemType: number;
  location: {
    parent: { item?: number; project: number };
  };
  fields: Record<string, string>;
}

/**
 * The remote store as the engine sees it. `JamaClient` talks to the REST API;
 * tests substitute an in-process fake.
 */
export interface JamaTransport {
  getProject(): Promise<JamaProject>;
  listItems(startAt: number, maxResults: number): Promise<JamaPage<JamaItem>>;
  createItem(request: JamaCreateItemRequest): Promise<number>;
  updateItem(id: number, fields: Record<string, string>): Promise<void>;
  deleteItem(id: number): Promise<void>;
}

/**
 * A node of the remote hierarchy after field names were canonicalized
 */
export interface RemoteItem {
  id?: number;
  itemType: ItemKind;
  name: string;
  sequence: string;
  pathSegments: string[];
  fields: Partial<Record<CanonicalField, string>>;
}
