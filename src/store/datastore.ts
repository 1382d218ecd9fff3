/**
 * Cloud Datastore store over the v1 REST API.
 * Works against production (`https://datastore.googleapis.com`) with a bearer
 * token, or against the emulator with no credentials.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import type { DocumentStore } from './base.js';
import type { Entity, EntityKey, PathElement, PropertyValue, Query } from '../types.js';
import {
  StoreConnectionError,
  StoreAuthError,
  StoreRequestError,
  MalformedEntityError,
} from '../errors.js';
import { isEntityKey, keyKind } from './key.js';
import { createLogger } from '../logger.js';

/** Options for constructing a DatastoreStore. */
export interface DatastoreStoreOptions {
  projectId: string;
  apiUrl?: string;
  namespace?: string;
  accessToken?: string;
  timeoutMs?: number;
  logger?: Logger;
}

// ─── Wire format ────────────────────────────────────────────────────────────

const pathElementSchema = z.object({
  kind: z.string(),
  id: z.string().optional(),
  name: z.string().optional(),
});

const keySchema = z.object({
  partitionId: z
    .object({ projectId: z.string().optional(), namespaceId: z.string().optional() })
    .optional(),
  path: z.array(pathElementSchema),
});

type WireKey = z.infer<typeof keySchema>;

interface WireValue {
  nullValue?: string | null;
  booleanValue?: boolean;
  integerValue?: string;
  doubleValue?: number;
  stringValue?: string;
  timestampValue?: string;
  keyValue?: WireKey;
  arrayValue?: { values?: WireValue[] };
  excludeFromIndexes?: boolean;
}

const valueSchema: z.ZodType<WireValue> = z.lazy(() =>
  z.object({
    nullValue: z.union([z.string(), z.null()]).optional(),
    booleanValue: z.boolean().optional(),
    integerValue: z.string().optional(),
    doubleValue: z.number().optional(),
    stringValue: z.string().optional(),
    timestampValue: z.string().optional(),
    keyValue: keySchema.optional(),
    arrayValue: z.object({ values: z.array(valueSchema).optional() }).optional(),
    excludeFromIndexes: z.boolean().optional(),
  }),
);

const entitySchema = z.object({
  key: keySchema,
  properties: z.record(valueSchema).optional(),
});

type WireEntity = z.infer<typeof entitySchema>;

const MAX_LOOKUP_ATTEMPTS = 5;

const lookupResponseSchema = z.object({
  found: z.array(z.object({ entity: entitySchema })).optional(),
  missing: z.array(z.object({ entity: z.object({ key: keySchema }) })).optional(),
  deferred: z.array(keySchema).optional(),
});

const commitResponseSchema = z.object({
  mutationResults: z.array(z.object({ key: keySchema.optional() })).optional(),
});

const runQueryResponseSchema = z.object({
  batch: z.object({
    entityResults: z.array(z.object({ entity: entitySchema })).optional(),
    moreResults: z.string().optional(),
    endCursor: z.string().optional(),
  }),
});

// ─── Translation ────────────────────────────────────────────────────────────

function pathFromWire(key: WireKey, kind: string): PathElement[] {
  return key.path.map((e) => {
    if (e.id !== undefined) {
      const id = Number(e.id);
      if (!Number.isSafeInteger(id)) {
        throw new MalformedEntityError(kind, '__key__', `id ${e.id} is not a safe integer`);
      }
      return { kind: e.kind, id };
    }
    if (e.name !== undefined) return { kind: e.kind, name: e.name };
    return { kind: e.kind };
  });
}

function valueFromWire(value: WireValue, kind: string, property: string): PropertyValue {
  if (value.stringValue !== undefined) return value.stringValue;
  if (value.integerValue !== undefined) {
    const n = Number(value.integerValue);
    if (!Number.isSafeInteger(n)) {
      throw new MalformedEntityError(kind, property, `${value.integerValue} is not a safe integer`);
    }
    return n;
  }
  if (value.doubleValue !== undefined) return value.doubleValue;
  if (value.booleanValue !== undefined) return value.booleanValue;
  if (value.timestampValue !== undefined) return value.timestampValue;
  if (value.keyValue !== undefined) return { path: pathFromWire(value.keyValue, kind) };
  if (value.arrayValue !== undefined) {
    return (value.arrayValue.values ?? []).map((v) => valueFromWire(v, kind, property));
  }
  if (value.nullValue !== undefined) return null;
  throw new MalformedEntityError(kind, property, 'unsupported value type');
}

function entityFromWire(wire: WireEntity): Entity {
  const key: EntityKey = { path: pathFromWire(wire.key, '__key__') };
  const kind = keyKind(key);
  const properties: Record<string, PropertyValue> = {};
  const excluded: string[] = [];
  for (const [name, value] of Object.entries(wire.properties ?? {})) {
    properties[name] = valueFromWire(value, kind, name);
    if (value.excludeFromIndexes || value.arrayValue?.values?.some((v) => v.excludeFromIndexes)) {
      excluded.push(name);
    }
  }
  const entity: Entity = { key, properties };
  if (excluded.length > 0) entity.excludeFromIndexes = excluded;
  return entity;
}

/** HTTP-backed document store that talks to Cloud Datastore. */
export class DatastoreStore implements DocumentStore {
  private readonly apiUrl: string;
  private readonly projectId: string;
  private readonly namespace: string | undefined;
  private readonly accessToken: string | undefined;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: DatastoreStoreOptions) {
    this.apiUrl = (options.apiUrl ?? 'https://datastore.googleapis.com').replace(/\/+$/, '');
    this.projectId = options.projectId;
    this.namespace = options.namespace;
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.log = (options.logger ?? createLogger({ level: 'silent' })).child({ store: 'datastore' });
  }

  private partitionId(): { projectId: string; namespaceId?: string } {
    return this.namespace
      ? { projectId: this.projectId, namespaceId: this.namespace }
      : { projectId: this.projectId };
  }

  private keyToWire(key: EntityKey): WireKey {
    return {
      partitionId: this.partitionId(),
      path: key.path.map((e) => {
        if (e.id !== undefined) return { kind: e.kind, id: String(e.id) };
        if (e.name !== undefined) return { kind: e.kind, name: e.name };
        return { kind: e.kind };
      }),
    };
  }

  private valueToWire(value: PropertyValue, excludeFromIndexes: boolean): WireValue {
    let wire: WireValue;
    if (value === null) {
      wire = { nullValue: 'NULL_VALUE' };
    } else if (typeof value === 'string') {
      wire = { stringValue: value };
    } else if (typeof value === 'number') {
      wire = Number.isInteger(value) ? { integerValue: String(value) } : { doubleValue: value };
    } else if (typeof value === 'boolean') {
      wire = { booleanValue: value };
    } else if (Array.isArray(value)) {
      // An array itself is never indexed-flagged; its elements carry the flag.
      return { arrayValue: { values: value.map((v) => this.valueToWire(v, excludeFromIndexes)) } };
    } else if (isEntityKey(value)) {
      wire = { keyValue: this.keyToWire(value) };
    } else {
      throw new Error('Unsupported property value');
    }
    if (excludeFromIndexes) wire.excludeFromIndexes = true;
    return wire;
  }

  private entityToWire(entity: Entity): { key: WireKey; properties: Record<string, WireValue> } {
    const excluded = new Set(entity.excludeFromIndexes ?? []);
    const properties: Record<string, WireValue> = {};
    for (const [name, value] of Object.entries(entity.properties)) {
      properties[name] = this.valueToWire(value, excluded.has(name));
    }
    return { key: this.keyToWire(entity.key), properties };
  }

  private async request(method: 'lookup' | 'commit' | 'runQuery', body: unknown): Promise<unknown> {
    const url = `${this.apiUrl}/v1/projects/${encodeURIComponent(this.projectId)}:${method}`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.accessToken) headers.Authorization = `Bearer ${this.accessToken}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    this.log.debug({ method }, 'Datastore request');
    let resp: Response;
    try {
      resp = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (error.name === 'AbortError') {
        throw new StoreConnectionError(`Request timed out: ${url}`);
      }
      throw new StoreConnectionError(`Cannot connect to ${this.apiUrl}: ${error.message}`);
    } finally {
      clearTimeout(timer);
    }

    if (resp.status === 401 || resp.status === 403) {
      const text = await resp.text();
      throw new StoreAuthError(`Authentication failed (${resp.status}): ${text}`);
    }
    if (!resp.ok) {
      throw new StoreRequestError(method, resp.status, await resp.text());
    }
    const text = await resp.text();
    try {
      return JSON.parse(text);
    } catch (err: unknown) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new MalformedEntityError('response', method, `body is not JSON: ${detail}`);
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, method: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new MalformedEntityError('response', method, result.error.message);
    }
    return result.data;
  }

  async get(key: EntityKey): Promise<Entity | null> {
    // Keys the server defers have not been looked up yet; ask again.
    for (let attempt = 1; attempt <= MAX_LOOKUP_ATTEMPTS; attempt++) {
      const data = await this.request('lookup', {
        keys: [this.keyToWire(key)],
      });
      const resp = this.parse(lookupResponseSchema, data, 'lookup');
      const found = resp.found ?? [];
      if (found.length > 0) return entityFromWire(found[0].entity);
      if ((resp.deferred ?? []).length === 0) return null;
      this.log.debug({ attempt }, 'Lookup deferred');
    }
    throw new StoreRequestError('lookup', 200, `key still deferred after ${MAX_LOOKUP_ATTEMPTS} attempts`);
  }

  async put(entity: Entity): Promise<EntityKey> {
    const data = await this.request('commit', {
      mode: 'NON_TRANSACTIONAL',
      mutations: [{ upsert: this.entityToWire(entity) }],
    });
    const results = this.parse(commitResponseSchema, data, 'commit').mutationResults ?? [];
    const allocated = results[0]?.key;
    // The server only echoes a key it allocated.
    return allocated ? { path: pathFromWire(allocated, keyKind(entity.key)) } : entity.key;
  }

  async query(query: Query): Promise<Entity[]> {
    const filters: unknown[] = [];
    if (query.ancestor) {
      filters.push({
        propertyFilter: {
          property: { name: '__key__' },
          op: 'HAS_ANCESTOR',
          value: { keyValue: this.keyToWire(query.ancestor) },
        },
      });
    }
    for (const f of query.filters ?? []) {
      filters.push({
        propertyFilter: {
          property: { name: f.property },
          op: 'EQUAL',
          value: this.valueToWire(f.value, false),
        },
      });
    }

    const wireQuery: Record<string, unknown> = { kind: [{ name: query.kind }] };
    if (filters.length === 1) {
      wireQuery.filter = filters[0];
    } else if (filters.length > 1) {
      wireQuery.filter = { compositeFilter: { op: 'AND', filters } };
    }
    if (query.order && query.order.length > 0) {
      wireQuery.order = query.order.map((o) => ({
        property: { name: o.property },
        direction: o.direction === 'descending' ? 'DESCENDING' : 'ASCENDING',
      }));
    }

    const entities: Entity[] = [];
    let cursor: string | undefined;
    for (;;) {
      const data = await this.request('runQuery', {
        partitionId: this.partitionId(),
        query: cursor ? { ...wireQuery, startCursor: cursor } : wireQuery,
      });
      const { batch } = this.parse(runQueryResponseSchema, data, 'runQuery');
      for (const result of batch.entityResults ?? []) {
        entities.push(entityFromWire(result.entity));
      }
      if (batch.moreResults !== 'NOT_FINISHED' || !batch.endCursor) break;
      cursor = batch.endCursor;
    }
    return entities;
  }

  async close(): Promise<void> {
    // No persistent connection to close with fetch
  }
}
