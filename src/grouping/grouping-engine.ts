import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { GraphError } from '../common/errors/graph-error';
import { OntologyGraph } from '../graph-store/ontology-graph';
import {
  CollapsedRelationship,
  Concept,
  ConceptGroup,
  ExpansionResult,
  GroupChange,
  GroupCommit,
  GroupFixups,
  Relationship,
} from '../graph-store/types/graph.types';
import { layoutExpandedChildren, Point } from './expansion-layout';
import {
  DEFAULT_GROUPING_OPTIONS,
  GROUPING_OPTIONS,
  GroupingOptions,
  GroupValidation,
} from './grouping.types';
import { projectVisibleGraph, VisibleGraph } from './visible-graph';

const membersOf = (group: Pick<ConceptGroup, 'parentConceptId' | 'childConceptIds'>) =>
  new Set([group.parentConceptId, ...group.childConceptIds]);

function deriveRecord(
  relationship: Relationship,
  members: ReadonlySet<number>,
): CollapsedRelationship | null {
  const isFromGroupedChild = members.has(relationship.sourceConceptId);
  const isToGroupedChild = members.has(relationship.targetConceptId);
  if (!isFromGroupedChild && !isToGroupedChild) return null;

  const internal = isFromGroupedChild && isToGroupedChild;
  return {
    relationshipId: relationship.id,
    relationType: relationship.relationType,
    fromConceptId: relationship.sourceConceptId,
    toConceptId: relationship.targetConceptId,
    externalConceptId: internal
      ? null
      : isFromGroupedChild
        ? relationship.targetConceptId
        : relationship.sourceConceptId,
    isFromGroupedChild,
    isToGroupedChild,
    shouldBeRerouted: !internal,
  };
}

const sameRecord = (a: CollapsedRelationship, b: CollapsedRelationship) =>
  a.relationshipId === b.relationshipId &&
  a.relationType === b.relationType &&
  a.fromConceptId === b.fromConceptId &&
  a.toConceptId === b.toConceptId &&
  a.externalConceptId === b.externalConceptId &&
  a.isFromGroupedChild === b.isFromGroupedChild &&
  a.isToGroupedChild === b.isToGroupedChild &&
  a.shouldBeRerouted === b.shouldBeRerouted;

/**
 * Collapse, expand and membership rules for concept groups.
 *
 * The engine mutates an OntologyGraph it is handed and never keeps state of
 * its own; the store calls it inside the ontology's mutation queue. Every
 * public mutation validates first, so a thrown GraphError leaves the graph
 * untouched.
 */
@Injectable()
export class GroupingEngine {
  private readonly logger = new Logger(GroupingEngine.name);
  private readonly options: GroupingOptions;

  constructor(
    @Optional() @Inject(GROUPING_OPTIONS) options?: Partial<GroupingOptions>,
  ) {
    this.options = { ...DEFAULT_GROUPING_OPTIONS, ...options };
  }

  get maxDepth(): number {
    return this.options.maxDepth;
  }

  // ============================================
  // VALIDATION (read-only)
  // ============================================

  canCreateGroup(
    graph: OntologyGraph,
    parentConceptId: number,
    candidateChildIds: readonly number[],
  ): boolean {
    return this.validateGroup(graph, parentConceptId, candidateChildIds).ok;
  }

  /** First failing rule for grouping `candidateChildIds` under the parent. */
  validateGroup(
    graph: OntologyGraph,
    parentConceptId: number,
    candidateChildIds: readonly number[],
  ): GroupValidation {
    const candidates = [...new Set(candidateChildIds)];
    if (candidates.length === 0) {
      return fail('ValidationFailed', 'A group needs at least one child concept');
    }

    const missing = [parentConceptId, ...candidates].find(
      (id) => !graph.hasConcept(id),
    );
    if (missing !== undefined) {
      return fail('NotFound', `Concept ${missing} not found`);
    }

    const groups = graph.listGroups();
    const grouped = new Map<number, number>();
    for (const group of groups) {
      group.childConceptIds.forEach((id) => grouped.set(id, group.id));
    }

    const alreadyGrouped = candidates.find((id) => grouped.has(id));
    if (alreadyGrouped !== undefined) {
      return fail(
        'AlreadyGrouped',
        `Concept ${alreadyGrouped} already belongs to group ${grouped.get(alreadyGrouped)}`,
      );
    }

    if (candidates.includes(parentConceptId)) {
      return fail(
        'CircularReference',
        `Concept ${parentConceptId} cannot be grouped under itself`,
      );
    }

    const ancestor = candidates.find((id) =>
      this.descendantsOf(groups, id).has(parentConceptId),
    );
    if (ancestor !== undefined) {
      return fail(
        'CircularReference',
        `Concept ${parentConceptId} is already nested inside concept ${ancestor}`,
      );
    }

    const anchor = candidates.find((id) =>
      groups.some((g) => g.parentConceptId === id),
    );
    if (anchor !== undefined) {
      return fail(
        'AlreadyGrouped',
        `Concept ${anchor} anchors its own group and cannot be a child`,
      );
    }

    const depth = this.nestingDepth(groups, parentConceptId) + 1;
    if (depth > this.options.maxDepth) {
      return fail(
        'DepthExceeded',
        `Group nesting depth ${depth} exceeds the limit of ${this.options.maxDepth}`,
      );
    }

    return { ok: true };
  }

  // BFS over group nesting: children of groups anchored by `conceptId`, recursively
  private descendantsOf(
    groups: readonly ConceptGroup[],
    conceptId: number,
  ): Set<number> {
    const visited = new Set<number>();
    const queue = [conceptId];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const group of groups) {
        if (group.parentConceptId !== current) continue;
        for (const childId of group.childConceptIds) {
          if (visited.has(childId)) continue;
          visited.add(childId);
          queue.push(childId);
        }
      }
    }
    return visited;
  }

  // Number of groups between `conceptId` and the top level
  private nestingDepth(groups: readonly ConceptGroup[], conceptId: number): number {
    const seen = new Set<number>();
    let depth = 0;
    let current = conceptId;
    for (;;) {
      const container = groups.find((g) => g.childConceptIds.includes(current));
      if (!container || seen.has(container.id)) return depth;
      seen.add(container.id);
      depth += 1;
      current = container.parentConceptId;
    }
  }

  // ============================================
  // GROUP OPERATIONS
  // ============================================

  applyGroupChange(
    graph: OntologyGraph,
    change: GroupChange,
    userId: string,
    now: Date,
  ): GroupCommit {
    switch (change.op) {
      case 'create':
        return this.createGroup(
          graph,
          change.parentConceptId,
          change.childConceptIds,
          userId,
          now,
          change.groupName,
        );
      case 'expand':
        return this.expandGroup(graph, change.groupId, now, change.dissolve);
      case 'collapse':
        return this.collapseGroup(graph, change.groupId, now);
      case 'add-member':
        return this.addMember(graph, change.groupId, change.conceptId, now);
      case 'remove-member':
        return this.removeMember(graph, change.groupId, change.conceptId, now);
      case 'delete':
        return this.deleteGroup(graph, change.groupId);
    }
  }

  createGroup(
    graph: OntologyGraph,
    parentConceptId: number,
    childConceptIds: readonly number[],
    createdBy: string,
    now: Date,
    groupName?: string | null,
  ): GroupCommit {
    this.assertValid(this.validateGroup(graph, parentConceptId, childConceptIds));

    const children = [...new Set(childConceptIds)];
    const existing = graph
      .listGroups()
      .find((g) => g.parentConceptId === parentConceptId);

    if (existing) {
      const merged = [...existing.childConceptIds, ...children];
      const group = graph.replaceGroup(
        {
          ...existing,
          childConceptIds: merged,
          isCollapsed: true,
          collapsedRelationships: this.deriveRecords(graph, parentConceptId, merged),
          groupName: groupName?.trim() || existing.groupName,
        },
        now,
      );
      this.logger.log(
        `Merged ${children.length} concept(s) into group ${group.id} of concept ${parentConceptId}`,
      );
      return groupCommit('updated', 'create', group);
    }

    const group = graph.insertGroup(
      {
        createdBy,
        parentConceptId,
        childConceptIds: children,
        isCollapsed: true,
        collapsedRelationships: this.deriveRecords(graph, parentConceptId, children),
        groupName: groupName?.trim() || null,
      },
      now,
    );
    return groupCommit('added', 'create', group);
  }

  expandGroup(
    graph: OntologyGraph,
    groupId: number,
    now: Date,
    dissolve = false,
  ): GroupCommit {
    const current = this.requireGroup(graph, groupId);
    const before = projectVisibleGraph(graph.snapshot());

    let group = graph.replaceGroup({ ...current, isCollapsed: false }, now);
    if (dissolve) {
      group = graph.deleteGroup(groupId);
    }

    const after = projectVisibleGraph(graph.snapshot());
    const expansion = diffExpansion(before, after);

    const revealedChildren = group.childConceptIds.filter((id) =>
      expansion.revealedConceptIds.includes(id),
    );
    const members = membersOf(group);
    const parent = graph.getConcept(group.parentConceptId);
    const center: Point = {
      x: parent?.positionX ?? 0,
      y: parent?.positionY ?? 0,
    };
    const obstacles = after.concepts
      .filter((c) => !members.has(c.id))
      .flatMap((c) =>
        c.positionX === null || c.positionY === null
          ? []
          : [{ x: c.positionX, y: c.positionY }],
      );

    expansion.positions = layoutExpandedChildren(
      center,
      revealedChildren,
      obstacles,
      this.options.layout,
    );
    const movedConcepts: Concept[] = expansion.positions.map((p) =>
      graph.moveConcept(p.conceptId, p.x, p.y, now),
    );

    return {
      changeType: dissolve ? 'deleted' : 'updated',
      action: 'expand',
      group,
      expansion,
      movedConcepts,
    };
  }

  /**
   * Re-hides the recorded relationships. Records are reused as stored; only
   * records that no longer match the graph are repaired.
   */
  collapseGroup(graph: OntologyGraph, groupId: number, now: Date): GroupCommit {
    const current = this.requireGroup(graph, groupId);
    const members = membersOf(current);
    const derived = new Map(
      this.deriveRecords(graph, current.parentConceptId, current.childConceptIds).map(
        (r) => [r.relationshipId, r],
      ),
    );

    const records: CollapsedRelationship[] = [];
    for (const record of current.collapsedRelationships) {
      const fresh = derived.get(record.relationshipId);
      derived.delete(record.relationshipId);
      if (!fresh) {
        this.logger.warn(
          `Group ${groupId}: dropping record of relationship ${record.relationshipId}, no longer attached to members`,
        );
        continue;
      }
      if (!sameRecord(record, fresh)) {
        this.logger.warn(
          `Group ${groupId}: relationship ${record.relationshipId} changed since it was recorded`,
        );
      }
      records.push(fresh);
    }
    for (const fresh of derived.values()) {
      this.logger.log(
        `Group ${groupId}: recording relationship ${fresh.relationshipId} created while expanded`,
      );
      records.push(fresh);
    }

    const group = graph.replaceGroup(
      { ...current, isCollapsed: true, collapsedRelationships: records },
      now,
    );
    this.logger.debug(`Group ${groupId} collapsed over ${members.size} concepts`);
    return groupCommit('updated', 'collapse', group);
  }

  addMember(
    graph: OntologyGraph,
    groupId: number,
    conceptId: number,
    now: Date,
  ): GroupCommit {
    const current = this.requireGroup(graph, groupId);
    this.assertValid(this.validateGroup(graph, current.parentConceptId, [conceptId]));

    const childConceptIds = [...current.childConceptIds, conceptId];
    const group = graph.replaceGroup(
      {
        ...current,
        childConceptIds,
        collapsedRelationships: current.isCollapsed
          ? this.deriveRecords(graph, current.parentConceptId, childConceptIds)
          : current.collapsedRelationships,
      },
      now,
    );
    return groupCommit('updated', 'add-member', group);
  }

  removeMember(
    graph: OntologyGraph,
    groupId: number,
    conceptId: number,
    now: Date,
  ): GroupCommit {
    const current = this.requireGroup(graph, groupId);
    if (!current.childConceptIds.includes(conceptId)) {
      throw new GraphError(
        'NotFound',
        `Concept ${conceptId} is not a member of group ${groupId}`,
      );
    }

    const childConceptIds = current.childConceptIds.filter((id) => id !== conceptId);
    if (childConceptIds.length === 0) {
      const group = graph.deleteGroup(groupId);
      return groupCommit('deleted', 'remove-member', {
        ...group,
        childConceptIds,
      });
    }

    const group = graph.replaceGroup(
      {
        ...current,
        childConceptIds,
        collapsedRelationships: this.recordsForMembers(
          graph,
          current,
          childConceptIds,
        ),
      },
      now,
    );
    return groupCommit('updated', 'remove-member', group);
  }

  deleteGroup(graph: OntologyGraph, groupId: number): GroupCommit {
    this.requireGroup(graph, groupId);
    return groupCommit('deleted', 'delete', graph.deleteGroup(groupId));
  }

  // ============================================
  // FIXUPS AFTER GRAPH MUTATIONS
  // ============================================

  /**
   * Runs after a concept and its relationships were deleted: drops groups it
   * anchored, removes it from child sets and forgets records of deleted
   * relationships.
   */
  onConceptDeleted(graph: OntologyGraph, conceptId: number, now: Date): GroupFixups {
    const fixups: GroupFixups = { updatedGroups: [], deletedGroupIds: [] };

    for (const group of graph.listGroups()) {
      if (group.parentConceptId === conceptId) {
        graph.deleteGroup(group.id);
        fixups.deletedGroupIds.push(group.id);
        continue;
      }

      const childConceptIds = group.childConceptIds.filter((id) => id !== conceptId);
      if (childConceptIds.length === 0) {
        graph.deleteGroup(group.id);
        fixups.deletedGroupIds.push(group.id);
        continue;
      }

      const records =
        childConceptIds.length !== group.childConceptIds.length
          ? this.recordsForMembers(graph, group, childConceptIds)
          : group.collapsedRelationships.filter((r) =>
              graph.hasRelationship(r.relationshipId),
            );
      if (
        childConceptIds.length === group.childConceptIds.length &&
        records.length === group.collapsedRelationships.length
      ) {
        continue;
      }

      fixups.updatedGroups.push(
        graph.replaceGroup(
          { ...group, childConceptIds, collapsedRelationships: records },
          now,
        ),
      );
    }

    if (fixups.deletedGroupIds.length > 0) {
      this.logger.log(
        `Concept ${conceptId} deletion removed group(s) ${fixups.deletedGroupIds.join(', ')}`,
      );
    }
    return fixups;
  }

  /**
   * Brings every group's record of one relationship in line with the graph
   * after the relationship was created, updated or deleted. Collapsed groups
   * gain a record for a new relationship touching their members.
   */
  syncRelationship(
    graph: OntologyGraph,
    relationshipId: number,
    now: Date,
  ): ConceptGroup[] {
    const relationship = graph.getRelationship(relationshipId);
    const updated: ConceptGroup[] = [];

    for (const group of graph.listGroups()) {
      const index = group.collapsedRelationships.findIndex(
        (r) => r.relationshipId === relationshipId,
      );
      const fresh = relationship ? deriveRecord(relationship, membersOf(group)) : null;

      let records: CollapsedRelationship[] | null = null;
      if (index >= 0 && !fresh) {
        records = group.collapsedRelationships.filter((_, i) => i !== index);
      } else if (index >= 0 && fresh) {
        if (!sameRecord(group.collapsedRelationships[index], fresh)) {
          records = group.collapsedRelationships.map((r, i) => (i === index ? fresh : r));
        }
      } else if (fresh && group.isCollapsed) {
        records = [...group.collapsedRelationships, fresh];
      }

      if (records) {
        updated.push(
          graph.replaceGroup({ ...group, collapsedRelationships: records }, now),
        );
      }
    }
    return updated;
  }

  // ============================================
  // HELPERS
  // ============================================

  /** Records for every relationship touching the members, each once, by id. */
  deriveRecords(
    graph: OntologyGraph,
    parentConceptId: number,
    childConceptIds: readonly number[],
  ): CollapsedRelationship[] {
    const members = new Set([parentConceptId, ...childConceptIds]);
    return graph
      .relationshipsTouching(members)
      .flatMap((r) => deriveRecord(r, members) ?? []);
  }

  private recordsForMembers(
    graph: OntologyGraph,
    group: ConceptGroup,
    childConceptIds: readonly number[],
  ): CollapsedRelationship[] {
    return group.isCollapsed
      ? this.deriveRecords(graph, group.parentConceptId, childConceptIds)
      : group.collapsedRelationships.filter((r) =>
          graph.hasRelationship(r.relationshipId),
        );
  }

  private requireGroup(graph: OntologyGraph, groupId: number): ConceptGroup {
    const group = graph.getGroup(groupId);
    if (!group) {
      throw new GraphError('GroupNotFound', `Group ${groupId} not found`);
    }
    return group;
  }

  private assertValid(result: GroupValidation): void {
    if (!result.ok) throw new GraphError(result.code, result.message);
  }
}

function fail(
  code: Exclude<GroupValidation, { ok: true }>['code'],
  message: string,
): GroupValidation {
  return { ok: false, code, message };
}

function groupCommit(
  changeType: GroupCommit['changeType'],
  action: GroupCommit['action'],
  group: ConceptGroup,
): GroupCommit {
  return { changeType, action, group, expansion: null, movedConcepts: [] };
}

function diffExpansion(before: VisibleGraph, after: VisibleGraph): ExpansionResult {
  const visibleBefore = new Set(before.concepts.map((c) => c.id));
  const directBefore = new Set(
    before.edges.flatMap((e) => (e.kind === 'relationship' ? [e.relationshipId] : [])),
  );
  const edgesAfter = new Set(after.edges.map((e) => e.id));

  return {
    revealedConceptIds: after.concepts
      .map((c) => c.id)
      .filter((id) => !visibleBefore.has(id)),
    restoredRelationshipIds: after.edges.flatMap((e) =>
      e.kind === 'relationship' && !directBefore.has(e.relationshipId)
        ? [e.relationshipId]
        : [],
    ),
    removedSyntheticEdgeIds: before.edges.flatMap((e) =>
      e.kind === 'rerouted' && !edgesAfter.has(e.id) ? [e.id] : [],
    ),
    positions: [],
  };
}
