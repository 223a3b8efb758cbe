import {
  Concept,
  ConceptGroup,
  GraphSnapshot,
  Individual,
} from '../graph-store/types/graph.types';

export interface VisibleConcept extends Concept {
  // Collapsed group this concept stands in for, if any
  collapsedGroupId: number | null;
}

export type VisibleEdge =
  | {
      kind: 'relationship';
      id: string;
      relationshipId: number;
      source: number;
      target: number;
      relationType: string;
      label: string | null;
    }
  | {
      kind: 'rerouted';
      id: string;
      relationshipId: number;
      groupId: number;
      source: number;
      target: number;
      relationType: string;
    }
  | {
      kind: 'instance-of';
      id: string;
      individualId: number;
      target: number;
    }
  | {
      kind: 'individual-relationship';
      id: string;
      individualRelationshipId: number;
      source: number;
      target: number;
      relationType: string;
    };

export type VisibleEdgeKind = VisibleEdge['kind'];

export interface VisibleGraph {
  concepts: VisibleConcept[];
  individuals: Individual[];
  edges: VisibleEdge[];
}

export const reroutedEdgeId = (groupId: number, relationshipId: number) =>
  `rerouted-${groupId}-${relationshipId}`;

/**
 * Maps each concept to the node that currently draws it: itself when visible,
 * otherwise the nearest visible ancestor parent. A child is hidden when its
 * group is collapsed or when the group's parent is itself hidden.
 */
export class Representatives {
  private readonly groupOfChild = new Map<number, ConceptGroup>();
  private readonly cache = new Map<number, number>();

  constructor(groups: readonly ConceptGroup[]) {
    for (const group of groups) {
      for (const childId of group.childConceptIds) {
        this.groupOfChild.set(childId, group);
      }
    }
  }

  groupContaining(conceptId: number): ConceptGroup | undefined {
    return this.groupOfChild.get(conceptId);
  }

  of(conceptId: number): number {
    return this.resolve(conceptId, new Set());
  }

  isVisible(conceptId: number): boolean {
    return this.of(conceptId) === conceptId;
  }

  private resolve(conceptId: number, visiting: Set<number>): number {
    const cached = this.cache.get(conceptId);
    if (cached !== undefined) return cached;

    const group = this.groupOfChild.get(conceptId);
    // A stored containment cycle would recurse forever; treat it as visible
    if (!group || visiting.has(conceptId)) return conceptId;

    visiting.add(conceptId);
    const parentRep = this.resolve(group.parentConceptId, visiting);
    visiting.delete(conceptId);

    const rep =
      group.isCollapsed || parentRep !== group.parentConceptId
        ? parentRep
        : conceptId;
    this.cache.set(conceptId, rep);
    return rep;
  }
}

export function projectVisibleGraph(snapshot: GraphSnapshot): VisibleGraph {
  const groups = [...snapshot.groups].sort((a, b) => a.id - b.id);
  const reps = new Representatives(groups);
  const relationshipsById = new Map(
    snapshot.relationships.map((r) => [r.id, r]),
  );

  const collapsedByParent = new Map<number, number>();
  for (const group of groups) {
    if (group.isCollapsed && !collapsedByParent.has(group.parentConceptId)) {
      collapsedByParent.set(group.parentConceptId, group.id);
    }
  }

  const concepts: VisibleConcept[] = snapshot.concepts
    .filter((c) => reps.isVisible(c.id))
    .sort((a, b) => a.id - b.id)
    .map((c) => ({
      ...c,
      collapsedGroupId: collapsedByParent.get(c.id) ?? null,
    }));

  const edges: VisibleEdge[] = [];
  const hidden = new Set<number>();
  const emitted = new Set<number>();

  // Recorded relationships of collapsed groups
  for (const group of groups) {
    if (!group.isCollapsed) continue;
    for (const record of group.collapsedRelationships) {
      const relationship = relationshipsById.get(record.relationshipId);
      if (!relationship) continue;
      hidden.add(relationship.id);
      if (!record.shouldBeRerouted || emitted.has(relationship.id)) continue;

      const source = reps.of(
        record.isFromGroupedChild
          ? group.parentConceptId
          : relationship.sourceConceptId,
      );
      const target = reps.of(
        record.isToGroupedChild
          ? group.parentConceptId
          : relationship.targetConceptId,
      );
      if (source === target) continue;

      emitted.add(relationship.id);
      edges.push({
        kind: 'rerouted',
        id: reroutedEdgeId(group.id, relationship.id),
        relationshipId: relationship.id,
        groupId: group.id,
        source,
        target,
        relationType: relationship.relationType,
      });
    }
  }

  // Everything else, mapped through representatives
  for (const relationship of [...snapshot.relationships].sort(
    (a, b) => a.id - b.id,
  )) {
    if (hidden.has(relationship.id)) continue;
    const { sourceConceptId, targetConceptId } = relationship;
    const source = reps.of(sourceConceptId);
    const target = reps.of(targetConceptId);

    if (source === sourceConceptId && target === targetConceptId) {
      edges.push({
        kind: 'relationship',
        id: `rel-${relationship.id}`,
        relationshipId: relationship.id,
        source,
        target,
        relationType: relationship.relationType,
        label: relationship.label,
      });
      continue;
    }
    if (source === target) continue;

    const hiddenEndpoint =
      source !== sourceConceptId ? sourceConceptId : targetConceptId;
    const group = reps.groupContaining(hiddenEndpoint);
    if (!group) continue;
    edges.push({
      kind: 'rerouted',
      id: reroutedEdgeId(group.id, relationship.id),
      relationshipId: relationship.id,
      groupId: group.id,
      source,
      target,
      relationType: relationship.relationType,
    });
  }

  const individuals = [...snapshot.individuals].sort((a, b) => a.id - b.id);
  for (const individual of individuals) {
    edges.push({
      kind: 'instance-of',
      id: `instance-of-${individual.id}`,
      individualId: individual.id,
      target: reps.of(individual.conceptTypeId),
    });
  }

  for (const link of [...snapshot.individualRelationships].sort(
    (a, b) => a.id - b.id,
  )) {
    edges.push({
      kind: 'individual-relationship',
      id: `individual-rel-${link.id}`,
      individualRelationshipId: link.id,
      source: link.sourceIndividualId,
      target: link.targetIndividualId,
      relationType: link.relationType,
    });
  }

  return { concepts, individuals, edges };
}
