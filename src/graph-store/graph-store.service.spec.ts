import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { CLOCK } from '../common/clock';
import { GroupingEngine } from '../grouping/grouping-engine';
import { GraphPersistence } from './graph-persistence';
import { GraphStoreService } from './graph-store.service';
import { chainSnapshot } from './testing/graph-fixtures';
import { InMemoryGraphPersistence } from './testing/in-memory-graph-persistence';
import { CommitOrigin, GraphCommitEvent } from './types/graph.types';

const NOW = new Date('2024-05-05T10:00:00.000Z');
const origin: CommitOrigin = { userId: 'user-1', connectionId: 'conn-1' };

describe('GraphStoreService', () => {
  let moduleRef: TestingModule;
  let store: GraphStoreService;
  let persistence: InMemoryGraphPersistence;
  let events: GraphCommitEvent[];

  beforeEach(async () => {
    persistence = new InMemoryGraphPersistence([chainSnapshot(1)]);
    moduleRef = await Test.createTestingModule({
      providers: [
        GraphStoreService,
        GroupingEngine,
        { provide: GraphPersistence, useValue: persistence },
        { provide: CLOCK, useValue: () => NOW },
      ],
    }).compile();

    store = moduleRef.get(GraphStoreService);
    events = [];
    store.commits$.subscribe((event) => events.push(event));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await moduleRef.close();
  });

  it('commits concurrent changes one at a time in arrival order', async () => {
    const results = await Promise.all(
      ['first', 'second', 'third'].map((name) =>
        store.applyConceptChange(1, { op: 'update', id: 3, fields: { name } }, origin),
      ),
    );

    expect(results.map((r) => [r.sequence, r.commit.concept.version])).toEqual([
      [1, 2],
      [2, 3],
      [3, 4],
    ]);
    expect(events.map((e) => [e.kind, e.sequence])).toEqual([
      ['concept', 1],
      ['concept', 2],
      ['concept', 3],
    ]);
    expect((await store.snapshot(1)).concepts[2].name).toBe('third');
  });

  it('stamps commits with the ontology, clock and origin', async () => {
    const committed = await store.applyConceptChange(
      1,
      { op: 'create', fields: { name: 'D' } },
      origin,
    );

    expect(committed).toMatchObject({
      ontologyId: 1,
      sequence: 1,
      committedAt: NOW,
      origin,
      commit: { changeType: 'added', cascade: null },
    });
  });

  it('hands each commit to storage after publishing it', async () => {
    await store.applyConceptChange(1, { op: 'update', id: 1, fields: { name: 'A2' } }, origin);
    await store.flush(1);

    expect(persistence.persisted).toHaveLength(1);
    expect(persistence.persisted[0].sequence).toBe(1);
    expect(persistence.persisted[0].delta.concepts.upserted.map((c) => c.name)).toEqual([
      'A2',
    ]);
  });

  it('logs a failed write and stores its rows with a later write', async () => {
    const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    persistence.failNextPersist = new Error('disk full');

    const created = await store.applyConceptChange(
      1,
      { op: 'create', fields: { name: 'D' } },
      origin,
    );
    await store.applyConceptChange(1, { op: 'update', id: 1, fields: { name: 'A2' } }, origin);
    await store.flush(1);

    expect(created.sequence).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      '❌ Failed to persist commit 1 of ontology 1',
      expect.stringContaining('disk full'),
    );
    const written = new Map<number, string>();
    for (const { delta } of persistence.persisted) {
      delta.concepts.upserted.forEach((c) => written.set(c.id, c.name));
    }
    expect(Array.from(written.entries()).sort(([a], [b]) => a - b)).toEqual([
      [1, 'A2'],
      [4, 'D'],
    ]);
  });

  it('writes rows left over from a failed write on the next flush', async () => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    persistence.failNextPersist = new Error('connection reset');

    await store.applyConceptChange(1, { op: 'create', fields: { name: 'D' } }, origin);
    await store.flush(1);

    expect(persistence.persisted).toHaveLength(1);
    expect(persistence.persisted[0].sequence).toBe(1);
    expect(persistence.persisted[0].delta.concepts.upserted.map((c) => c.name)).toEqual(['D']);
  });

  it('unloads an ontology once its commits are stored', async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    await store.applyConceptChange(1, { op: 'update', id: 1, fields: { name: 'A2' } }, origin);

    expect(store.loadedOntologyIds()).toEqual([1]);
    expect(await store.unload(1)).toBe(true);
    expect(store.loadedOntologyIds()).toEqual([]);
    expect(persistence.persisted.map((p) => p.sequence)).toEqual([1]);
    expect(await store.unload(1)).toBe(false);
  });

  it('keeps an ontology loaded while its writes keep failing', async () => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    const persist = jest
      .spyOn(persistence, 'persist')
      .mockRejectedValue(new Error('disk full'));

    await store.applyConceptChange(1, { op: 'create', fields: { name: 'D' } }, origin);

    expect(await store.unload(1)).toBe(false);
    expect(store.loadedOntologyIds()).toEqual([1]);

    persist.mockRestore();
    expect(await store.unload(1)).toBe(true);
    expect(persistence.persisted.map((p) => p.delta.concepts.upserted.map((c) => c.name))).toEqual([
      ['D'],
    ]);
  });

  it('does not spend a sequence number on a rejected change', async () => {
    await expect(
      store.applyConceptChange(
        1,
        { op: 'update', id: 1, expectedVersion: 5, fields: { name: 'late' } },
        origin,
      ),
    ).rejects.toMatchObject({ code: 'StaleState' });

    const next = await store.applyConceptChange(
      1,
      { op: 'update', id: 1, expectedVersion: 1, fields: { name: 'on time' } },
      origin,
    );

    expect(next.sequence).toBe(1);
    expect(events).toHaveLength(1);
  });

  it('rejects changes to an unknown ontology', async () => {
    await expect(
      store.applyConceptChange(99, { op: 'create', fields: { name: 'X' } }, origin),
    ).rejects.toMatchObject({ code: 'NotFound', message: 'Ontology 99 not found' });
  });

  it('reports group fixups in the cascade of a concept delete', async () => {
    await store.applyGroupChange(
      1,
      { op: 'create', parentConceptId: 1, childConceptIds: [2] },
      origin,
    );

    const committed = await store.applyConceptChange(1, { op: 'delete', id: 2 }, origin);

    expect(committed.commit.cascade).toEqual({
      deletedRelationshipIds: [1, 2],
      deletedIndividualIds: [],
      deletedIndividualRelationshipIds: [],
      updatedGroups: [],
      deletedGroupIds: [1],
    });
    expect(await store.visibleGraph(1)).toMatchObject({
      concepts: [{ id: 1 }, { id: 3 }],
      edges: [],
    });
  });

  it('keeps collapsed groups in step with relationship changes', async () => {
    await store.applyGroupChange(
      1,
      { op: 'create', parentConceptId: 1, childConceptIds: [2] },
      origin,
    );

    const committed = await store.applyRelationshipChange(
      1,
      {
        op: 'create',
        fields: { sourceConceptId: 3, targetConceptId: 2, relationType: 'uses' },
      },
      origin,
    );

    expect(committed.commit.updatedGroups.map((g) => g.collapsedRelationships.length)).toEqual([
      3,
    ]);
    expect(events.map((e) => e.kind)).toEqual(['group', 'relationship']);
  });

  it('answers group validation against the current graph', async () => {
    expect(await store.canCreateGroup(1, 1, [2])).toBe(true);
    expect(await store.validateGroup(1, 1, [1])).toMatchObject({
      ok: false,
      code: 'CircularReference',
    });
  });
});
