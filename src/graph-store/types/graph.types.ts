// Domain model of one ontology graph, as held in memory and sent to clients

export interface EntityMeta {
  id: number;
  ontologyId: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface Concept extends EntityMeta {
  name: string;
  category: string | null;
  color: string | null;
  definition: string | null;
  // Last known layout position; expansion layout reads and writes it
  positionX: number | null;
  positionY: number | null;
}

export interface Relationship extends EntityMeta {
  sourceConceptId: number;
  targetConceptId: number;
  relationType: string;
  label: string | null;
}

export interface Individual extends EntityMeta {
  conceptTypeId: number;
  name: string;
  label: string | null;
  description: string | null;
}

export interface IndividualRelationship extends EntityMeta {
  sourceIndividualId: number;
  targetIndividualId: number;
  relationType: string;
}

/**
 * One relationship touched by a group, captured when the group collapsed.
 * Internal records (`shouldBeRerouted = false`) are only hidden; boundary
 * records are hidden and drawn as a synthetic edge between the group's parent
 * and `externalConceptId`.
 */
export interface CollapsedRelationship {
  relationshipId: number;
  relationType: string;
  fromConceptId: number;
  toConceptId: number;
  externalConceptId: number | null;
  isFromGroupedChild: boolean;
  isToGroupedChild: boolean;
  shouldBeRerouted: boolean;
}

export interface ConceptGroup extends EntityMeta {
  createdBy: string;
  parentConceptId: number;
  childConceptIds: number[];
  isCollapsed: boolean;
  collapsedRelationships: CollapsedRelationship[];
  groupName: string | null;
}

export interface GraphSnapshot {
  ontologyId: number;
  sequence: number;
  concepts: Concept[];
  relationships: Relationship[];
  individuals: Individual[];
  individualRelationships: IndividualRelationship[];
  groups: ConceptGroup[];
}

// ============================================
// PROPOSED CHANGES
// ============================================

export interface ConceptFields {
  name: string;
  category?: string | null;
  color?: string | null;
  definition?: string | null;
  positionX?: number | null;
  positionY?: number | null;
}

export type ConceptChange =
  | { op: 'create'; id?: number; fields: ConceptFields }
  | {
      op: 'update';
      id: number;
      expectedVersion?: number;
      fields: Partial<ConceptFields>;
    }
  | { op: 'delete'; id: number; expectedVersion?: number };

export interface RelationshipFields {
  sourceConceptId: number;
  targetConceptId: number;
  relationType: string;
  label?: string | null;
}

export type RelationshipChange =
  | { op: 'create'; id?: number; fields: RelationshipFields }
  | {
      op: 'update';
      id: number;
      expectedVersion?: number;
      fields: Partial<RelationshipFields>;
    }
  | { op: 'delete'; id: number; expectedVersion?: number };

export interface IndividualFields {
  conceptTypeId: number;
  name: string;
  label?: string | null;
  description?: string | null;
}

export type IndividualChange =
  | { op: 'create'; id?: number; fields: IndividualFields }
  | {
      op: 'update';
      id: number;
      expectedVersion?: number;
      fields: Partial<IndividualFields>;
    }
  | { op: 'delete'; id: number; expectedVersion?: number };

export interface IndividualRelationshipFields {
  sourceIndividualId: number;
  targetIndividualId: number;
  relationType: string;
}

export type IndividualRelationshipChange =
  | { op: 'create'; id?: number; fields: IndividualRelationshipFields }
  | {
      op: 'update';
      id: number;
      expectedVersion?: number;
      fields: Partial<IndividualRelationshipFields>;
    }
  | { op: 'delete'; id: number; expectedVersion?: number };

export type GroupChange =
  | {
      op: 'create';
      parentConceptId: number;
      childConceptIds: number[];
      groupName?: string | null;
    }
  | { op: 'expand'; groupId: number; dissolve?: boolean }
  | { op: 'collapse'; groupId: number }
  | { op: 'add-member'; groupId: number; conceptId: number }
  | { op: 'remove-member'; groupId: number; conceptId: number }
  | { op: 'delete'; groupId: number };

export type ChangeOp = 'create' | 'update' | 'delete';

// ============================================
// COMMITTED RESULTS
// ============================================

export type ChangeType = 'added' | 'updated' | 'deleted';

export interface GroupFixups {
  updatedGroups: ConceptGroup[];
  deletedGroupIds: number[];
}

export interface ConceptCascade extends GroupFixups {
  deletedRelationshipIds: number[];
  deletedIndividualIds: number[];
  deletedIndividualRelationshipIds: number[];
}

export interface ConceptCommit {
  changeType: ChangeType;
  concept: Concept;
  cascade: ConceptCascade | null;
}

export interface RelationshipCommit {
  changeType: ChangeType;
  relationship: Relationship;
  updatedGroups: ConceptGroup[];
}

export interface IndividualCommit {
  changeType: ChangeType;
  individual: Individual;
  deletedIndividualRelationshipIds: number[];
}

export interface IndividualRelationshipCommit {
  changeType: ChangeType;
  individualRelationship: IndividualRelationship;
}

export interface PlacedConcept {
  conceptId: number;
  x: number;
  y: number;
}

export interface ExpansionResult {
  revealedConceptIds: number[];
  restoredRelationshipIds: number[];
  removedSyntheticEdgeIds: string[];
  positions: PlacedConcept[];
}

export interface GroupCommit {
  changeType: ChangeType;
  action: GroupChange['op'];
  group: ConceptGroup;
  expansion: ExpansionResult | null;
  movedConcepts: Concept[];
}

export interface CommitOrigin {
  userId: string;
  connectionId: string | null;
}

interface CommitEnvelope {
  ontologyId: number;
  sequence: number;
  committedAt: Date;
  origin: CommitOrigin;
}

export type GraphCommitEvent =
  | (CommitEnvelope & { kind: 'concept'; commit: ConceptCommit })
  | (CommitEnvelope & { kind: 'relationship'; commit: RelationshipCommit })
  | (CommitEnvelope & { kind: 'individual'; commit: IndividualCommit })
  | (CommitEnvelope & {
      kind: 'individual-relationship';
      commit: IndividualRelationshipCommit;
    })
  | (CommitEnvelope & { kind: 'group'; commit: GroupCommit });

export type CommitKind = GraphCommitEvent['kind'];

export type Committed<T> = CommitEnvelope & { commit: T };

// ============================================
// PERSISTENCE DELTA
// ============================================

export interface GraphDelta {
  concepts: { upserted: Concept[]; deletedIds: number[] };
  relationships: { upserted: Relationship[]; deletedIds: number[] };
  individuals: { upserted: Individual[]; deletedIds: number[] };
  individualRelationships: {
    upserted: IndividualRelationship[];
    deletedIds: number[];
  };
  groups: { upserted: ConceptGroup[]; deletedIds: number[] };
}
