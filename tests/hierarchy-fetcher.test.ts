import { describe, it, expect, vi } from 'vitest';
import type { ProgressEvent } from '../src/types/sync.js';
import { fetchHierarchy, type FetchedItem, type FetchHierarchyOptions } from '../src/core/hierarchy-fetcher.js';
import { RemoteError } from '../src/utils/errors.js';
import { FakeTransport, makeItem } from './helpers/fake-transport.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

function makeTree(): FakeTransport {
  return new FakeTransport([
    makeItem(1, '1', 'Root'),
    makeItem(2, '1.1', 'A', { assignee: 'Alice' }, 1),
    makeItem(3, '1.1.1', 'A1', {}, 2),
    makeItem(4, '1.1.1.1', 'SYSP A1x', { description: '<p>x</p>' }, 3),
    makeItem(5, '1.2', 'B', {}, 1),
    makeItem(6, '2', 'Other'),
    makeItem(7, '2.1', 'O1', {}, 6),
  ]);
}

async function collect(transport: FakeTransport, options: FetchHierarchyOptions = {}): Promise<FetchedItem[]> {
  const items: FetchedItem[] = [];
  for await (const entry of fetchHierarchy(transport, options)) items.push(entry);
  return items;
}

function ids(items: FetchedItem[]): Array<number | undefined> {
  return items.map(entry => entry.item.id);
}

describe('fetchHierarchy', () => {
  it('should yield every item in native order with its ancestor names', async () => {
    const items = await collect(makeTree());

    expect(ids(items)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(items[3].ancestorPath).toEqual(['Root', 'A', 'A1']);
    expect(items[3].item.pathSegments).toEqual(['Root', 'A', 'A1', 'SYSP A1x']);
    expect(items[0].ancestorPath).toEqual([]);
  });

  it('should canonicalize fields and detect SYSP items', async () => {
    const items = await collect(makeTree());

    expect(items[1].item.fields).toEqual({ assignee: 'Alice' });
    expect(items[3].item.itemType).toBe('SYSP');
    expect(items[3].item.fields.description).toBe('<p>x</p>');
    expect(items[1].item.itemType).toBe('Requirement');
  });

  it('should never emit a path longer than maxDepth', async () => {
    const items = await collect(makeTree(), { maxDepth: 2 });

    expect(ids(items)).toEqual([1, 2, 5, 6, 7]);
    for (const entry of items) expect(entry.item.pathSegments.length).toBeLessThanOrEqual(2);
  });

  it('should start at the item with the given sequence', async () => {
    expect(ids(await collect(makeTree(), { sequence: '1.1' }))).toEqual([2, 3, 4]);
  });

  it('should start at the item with the given name', async () => {
    expect(ids(await collect(makeTree(), { name: 'A' }))).toEqual([2, 3, 4]);
  });

  it('should count depth from the start item', async () => {
    expect(ids(await collect(makeTree(), { sequence: '1.1', maxDepth: 1 }))).toEqual([2, 3]);
    expect(ids(await collect(makeTree(), { sequence: '1', maxDepth: 0 }))).toEqual([1]);
  });

  it('should not match a sequence that only shares a prefix', async () => {
    const transport = new FakeTransport([
      makeItem(1, '1', 'One'),
      makeItem(2, '1.1', 'One child'),
      makeItem(3, '11', 'Eleven'),
      makeItem(4, '11.1', 'Eleven child'),
    ]);

    expect(ids(await collect(transport, { sequence: '1' }))).toEqual([1, 2]);
  });

  it('should yield nothing when the start item does not exist', async () => {
    expect(await collect(makeTree(), { name: 'Missing' })).toEqual([]);
  });

  it('should stop paging once maxCount items were yielded', async () => {
    const transport = new FakeTransport(
      Array.from({ length: 120 }, (_, i) => makeItem(i + 1, String(i + 1), `Item ${i + 1}`)),
    );

    const items = await collect(transport, { maxCount: 50 });

    expect(items).toHaveLength(50);
    expect(transport.listCalls).toBe(1);
  });

  it('should page until the total is reached', async () => {
    const transport = new FakeTransport(
      Array.from({ length: 120 }, (_, i) => makeItem(i + 1, String(i + 1), `Item ${i + 1}`)),
    );

    const items = await collect(transport, { maxCount: 60 });
    expect(items).toHaveLength(60);
    expect(transport.listCalls).toBe(2);

    const all = await collect(new FakeTransport(transport.items));
    expect(all).toHaveLength(120);
  });

  it('should yield nothing for a zero count', async () => {
    const transport = makeTree();
    expect(await collect(transport, { maxCount: 0 })).toEqual([]);
    expect(transport.listCalls).toBe(0);
  });

  it('should report progress against the remote total', async () => {
    const events: ProgressEvent[] = [];

    await collect(makeTree(), { progress: { report: event => events.push(event) }, progressEvery: 3 });

    expect(events).toEqual([
      { phase: 'fetch', done: 3, total: 7 },
      { phase: 'fetch', done: 6, total: 7 },
      { phase: 'fetch', done: 7, total: 7 },
    ]);
  });

  it('should report an unknown total when a start item is given', async () => {
    const events: ProgressEvent[] = [];

    await collect(makeTree(), { name: 'A', progress: { report: event => events.push(event) }, progressEvery: 2 });

    expect(events).toEqual([
      { phase: 'fetch', done: 2, total: undefined },
      { phase: 'fetch', done: 3, total: undefined },
    ]);
  });

  it('should retry a transient page failure', async () => {
    const transport = makeTree();
    transport.failOn('list', 0, new RemoteError('busy', { status: 503, transient: true }));

    const items = await collect(transport, { retry: { baseDelayMs: 0 } });

    expect(items).toHaveLength(7);
    expect(transport.listCalls).toBe(2);
  });

  it('should surface a non-transient page failure', async () => {
    const transport = makeTree();
    transport.failOn('list', 0, new RemoteError('bad request', { status: 400 }));

    await expect(collect(transport, { retry: { baseDelayMs: 0 } })).rejects.toThrow('bad request');
  });
});
