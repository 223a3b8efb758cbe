import { GraphError } from '../common/errors/graph-error';
import { OntologyGraph } from '../graph-store/ontology-graph';
import {
  chainSnapshot,
  concept,
  group,
  relationship,
  snapshotOf,
} from '../graph-store/testing/graph-fixtures';
import { CollapsedRelationship } from '../graph-store/types/graph.types';
import { GroupingEngine } from './grouping-engine';
import { projectVisibleGraph } from './visible-graph';

const NOW = new Date('2024-03-01T12:00:00.000Z');

const internalAB: CollapsedRelationship = {
  relationshipId: 1,
  relationType: 'part-of',
  fromConceptId: 1,
  toConceptId: 2,
  externalConceptId: null,
  isFromGroupedChild: true,
  isToGroupedChild: true,
  shouldBeRerouted: false,
};

const boundaryBC: CollapsedRelationship = {
  relationshipId: 2,
  relationType: 'related-to',
  fromConceptId: 2,
  toConceptId: 3,
  externalConceptId: 3,
  isFromGroupedChild: true,
  isToGroupedChild: false,
  shouldBeRerouted: true,
};

function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof GraphError ? error.code : 'not-a-graph-error';
  }
  return undefined;
}

describe('GroupingEngine', () => {
  let engine: GroupingEngine;
  let graph: OntologyGraph;

  beforeEach(() => {
    engine = new GroupingEngine();
    graph = OntologyGraph.fromSnapshot(chainSnapshot());
  });

  describe('createGroup', () => {
    it('collapses B under A, hiding A->B and rerouting B->C to A->C', () => {
      const commit = engine.createGroup(graph, 1, [2], 'user-1', NOW);

      expect(commit.changeType).toBe('added');
      expect(commit.group).toMatchObject({
        id: 1,
        parentConceptId: 1,
        childConceptIds: [2],
        isCollapsed: true,
        createdBy: 'user-1',
        groupName: null,
        version: 1,
      });
      expect(commit.group.collapsedRelationships).toEqual([internalAB, boundaryBC]);

      const view = projectVisibleGraph(graph.snapshot());
      expect(view.concepts.map((c) => c.id)).toEqual([1, 3]);
      expect(view.edges.map((e) => [e.kind, e.id])).toEqual([
        ['rerouted', 'rerouted-1-2'],
      ]);
    });

    it('merges into the group the parent already anchors', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);

      const commit = engine.createGroup(graph, 1, [3], 'user-2', NOW, 'Everything');

      expect(commit.changeType).toBe('updated');
      expect(commit.action).toBe('create');
      expect(commit.group).toMatchObject({
        id: 1,
        childConceptIds: [2, 3],
        groupName: 'Everything',
        createdBy: 'user-1',
        version: 2,
      });
      expect(commit.group.collapsedRelationships.map((r) => r.shouldBeRerouted)).toEqual([
        false,
        false,
      ]);
      expect(graph.listGroups()).toHaveLength(1);
    });

    it('gives each parallel boundary relationship its own rerouted edge', () => {
      const parallel = OntologyGraph.fromSnapshot(
        snapshotOf(1, {
          concepts: [concept(1, 1), concept(1, 2), concept(1, 3)],
          relationships: [
            relationship(1, 1, 1, 2, 'part-of'),
            relationship(1, 2, 2, 3),
            relationship(1, 3, 2, 3),
          ],
        }),
      );

      const commit = engine.createGroup(parallel, 1, [2], 'user-1', NOW);

      expect(
        commit.group.collapsedRelationships.map((r) => [r.relationshipId, r.shouldBeRerouted]),
      ).toEqual([
        [1, false],
        [2, true],
        [3, true],
      ]);
      expect(
        projectVisibleGraph(parallel.snapshot()).edges.flatMap((e) =>
          e.kind === 'rerouted' ? [[e.id, e.source, e.target, e.relationType]] : [],
        ),
      ).toEqual([
        ['rerouted-1-2', 1, 3, 'related-to'],
        ['rerouted-1-3', 1, 3, 'related-to'],
      ]);

      const expanded = engine.expandGroup(parallel, 1, NOW);

      expect(expanded.expansion?.removedSyntheticEdgeIds).toEqual(['rerouted-1-2', 'rerouted-1-3']);
      expect(expanded.expansion?.restoredRelationshipIds).toEqual([1, 2, 3]);
      expect(projectVisibleGraph(parallel.snapshot()).edges.map((e) => e.id)).toEqual([
        'rel-1',
        'rel-2',
        'rel-3',
      ]);
    });

    it('leaves the graph untouched when validation fails', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);
      const before = graph.snapshot();

      expect(thrownCode(() => engine.createGroup(graph, 3, [2], 'user-1', NOW))).toBe(
        'AlreadyGrouped',
      );
      expect(graph.snapshot()).toEqual(before);
    });
  });

  describe('validateGroup', () => {
    it('refuses a child that already belongs to another group', () => {
      const shared = OntologyGraph.fromSnapshot(
        snapshotOf(1, {
          concepts: [concept(1, 1), concept(1, 2), concept(1, 5)],
          groups: [group(1, 1, 5, [2])],
        }),
      );

      expect(engine.canCreateGroup(shared, 1, [2])).toBe(false);
      expect(engine.validateGroup(shared, 1, [2])).toMatchObject({
        ok: false,
        code: 'AlreadyGrouped',
      });
    });

    const refusals: Array<[string, number, number[], string]> = [
      ['no children', 1, [], 'ValidationFailed'],
      ['a missing child', 1, [9], 'NotFound'],
      ['a missing parent', 9, [2], 'NotFound'],
      ['the parent as its own child', 1, [1], 'CircularReference'],
    ];

    it.each(refusals)('refuses %s', (_label, parent, children, code) => {
      expect(engine.validateGroup(graph, parent, children)).toMatchObject({
        ok: false,
        code,
      });
    });

    it('refuses a group that would contain its own ancestor', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);

      expect(engine.validateGroup(graph, 2, [1])).toMatchObject({
        ok: false,
        code: 'CircularReference',
      });
    });

    it('refuses a child that anchors a group of its own', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);

      expect(engine.validateGroup(graph, 3, [1])).toMatchObject({
        ok: false,
        code: 'AlreadyGrouped',
      });
    });

    it('allows nesting up to the configured depth', () => {
      const shallow = new GroupingEngine({ maxDepth: 2 });
      const deep = OntologyGraph.fromSnapshot(
        snapshotOf(1, {
          concepts: [concept(1, 1), concept(1, 2), concept(1, 3), concept(1, 4)],
        }),
      );
      shallow.createGroup(deep, 1, [2], 'user-1', NOW);
      shallow.createGroup(deep, 2, [3], 'user-1', NOW);

      expect(shallow.maxDepth).toBe(2);
      expect(shallow.validateGroup(deep, 3, [4])).toEqual({
        ok: false,
        code: 'DepthExceeded',
        message: 'Group nesting depth 3 exceeds the limit of 2',
      });
    });
  });

  describe('expandGroup', () => {
    it('restores hidden relationships and places the revealed child', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);

      const commit = engine.expandGroup(graph, 1, NOW);

      expect(commit.changeType).toBe('updated');
      expect(commit.group.isCollapsed).toBe(false);
      expect(commit.expansion).toEqual({
        revealedConceptIds: [2],
        restoredRelationshipIds: [1, 2],
        removedSyntheticEdgeIds: ['rerouted-1-2'],
        positions: [{ conceptId: 2, x: -150, y: 0 }],
      });
      expect(commit.movedConcepts).toMatchObject([
        { id: 2, positionX: -150, positionY: 0, version: 2 },
      ]);
      expect(projectVisibleGraph(graph.snapshot()).edges.map((e) => e.id)).toEqual([
        'rel-1',
        'rel-2',
      ]);
    });

    it('keeps the records so collapsing again gives the same view', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);
      const collapsedView = projectVisibleGraph(graph.snapshot()).edges;

      engine.expandGroup(graph, 1, NOW);
      const commit = engine.collapseGroup(graph, 1, NOW);

      expect(commit.group.collapsedRelationships).toEqual([internalAB, boundaryBC]);
      expect(projectVisibleGraph(graph.snapshot()).edges).toEqual(collapsedView);
    });

    it('never loses a relationship across collapse and expand', () => {
      const original = graph.snapshot().relationships;

      engine.createGroup(graph, 1, [2], 'user-1', NOW);
      engine.expandGroup(graph, 1, NOW);
      engine.collapseGroup(graph, 1, NOW);
      engine.expandGroup(graph, 1, NOW);

      expect(graph.snapshot().relationships).toEqual(original);
    });

    it('deletes the group when asked to dissolve it', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);

      const commit = engine.expandGroup(graph, 1, NOW, true);

      expect(commit.changeType).toBe('deleted');
      expect(commit.expansion?.revealedConceptIds).toEqual([2]);
      expect(graph.getGroup(1)).toBeUndefined();
    });

    it('reports an unknown group', () => {
      expect(
        thrownCode(() => engine.applyGroupChange(graph, { op: 'expand', groupId: 99 }, 'u', NOW)),
      ).toBe('GroupNotFound');
    });
  });

  describe('collapseGroup', () => {
    it('records relationships created while the group was expanded', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);
      engine.expandGroup(graph, 1, NOW);
      graph.applyRelationshipChange(
        {
          op: 'create',
          fields: { sourceConceptId: 3, targetConceptId: 2, relationType: 'depends-on' },
        },
        NOW,
      );
      expect(engine.syncRelationship(graph, 3, NOW)).toEqual([]);

      const commit = engine.collapseGroup(graph, 1, NOW);

      expect(commit.group.collapsedRelationships).toEqual([
        internalAB,
        boundaryBC,
        {
          relationshipId: 3,
          relationType: 'depends-on',
          fromConceptId: 3,
          toConceptId: 2,
          externalConceptId: 3,
          isFromGroupedChild: false,
          isToGroupedChild: true,
          shouldBeRerouted: true,
        },
      ]);
    });
  });

  describe('membership', () => {
    it('adds and removes members, re-deriving records while collapsed', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);

      const added = engine.addMember(graph, 1, 3, NOW);
      expect(added.group.childConceptIds).toEqual([2, 3]);
      expect(added.group.collapsedRelationships.every((r) => !r.shouldBeRerouted)).toBe(true);

      const removed = engine.removeMember(graph, 1, 3, NOW);
      expect(removed.group.childConceptIds).toEqual([2]);
      expect(removed.group.collapsedRelationships).toEqual([internalAB, boundaryBC]);
    });

    it('deletes the group when its last member leaves', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);

      const commit = engine.removeMember(graph, 1, 2, NOW);

      expect(commit.changeType).toBe('deleted');
      expect(commit.group.childConceptIds).toEqual([]);
      expect(graph.listGroups()).toEqual([]);
    });

    it('refuses to remove a concept that is not a member', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);

      expect(thrownCode(() => engine.removeMember(graph, 1, 3, NOW))).toBe('NotFound');
    });
  });

  describe('onConceptDeleted', () => {
    it('deletes a group left without children', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);
      graph.applyConceptChange({ op: 'delete', id: 2 }, NOW);

      expect(engine.onConceptDeleted(graph, 2, NOW)).toEqual({
        updatedGroups: [],
        deletedGroupIds: [1],
      });
    });

    it('deletes a group whose parent is gone', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);
      graph.applyConceptChange({ op: 'delete', id: 1 }, NOW);

      expect(engine.onConceptDeleted(graph, 1, NOW).deletedGroupIds).toEqual([1]);
    });

    it('drops a deleted child and the records of its relationships', () => {
      engine.createGroup(graph, 1, [2, 3], 'user-1', NOW);
      graph.applyConceptChange({ op: 'delete', id: 3 }, NOW);

      const fixups = engine.onConceptDeleted(graph, 3, NOW);

      expect(fixups.deletedGroupIds).toEqual([]);
      expect(fixups.updatedGroups).toHaveLength(1);
      expect(fixups.updatedGroups[0]).toMatchObject({
        childConceptIds: [2],
        collapsedRelationships: [internalAB],
      });
    });
  });

  describe('syncRelationship', () => {
    it('adds a record for a new relationship touching a collapsed group', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);
      graph.applyRelationshipChange(
        {
          op: 'create',
          fields: { sourceConceptId: 3, targetConceptId: 1, relationType: 'uses' },
        },
        NOW,
      );

      const updated = engine.syncRelationship(graph, 3, NOW);

      expect(updated).toHaveLength(1);
      expect(updated[0].collapsedRelationships[2]).toMatchObject({
        relationshipId: 3,
        externalConceptId: 3,
        isToGroupedChild: true,
      });
    });

    it('forgets the record of a deleted relationship', () => {
      engine.createGroup(graph, 1, [2], 'user-1', NOW);
      graph.applyRelationshipChange({ op: 'delete', id: 2 }, NOW);

      const updated = engine.syncRelationship(graph, 2, NOW);

      expect(updated[0].collapsedRelationships).toEqual([internalAB]);
    });
  });
});
