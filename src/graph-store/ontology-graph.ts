import { GraphError } from '../common/errors/graph-error';
import { assertVersion, EntityTable } from './entity-table';
import {
  ChangeType,
  Concept,
  ConceptChange,
  ConceptFields,
  ConceptGroup,
  EntityMeta,
  GraphDelta,
  GraphSnapshot,
  Individual,
  IndividualChange,
  IndividualRelationship,
  IndividualRelationshipChange,
  Relationship,
  RelationshipChange,
} from './types/graph.types';

export type GroupDraft = Omit<ConceptGroup, keyof EntityMeta>;

export interface ConceptMutation {
  changeType: ChangeType;
  concept: Concept;
  deletedRelationshipIds: number[];
  deletedIndividualIds: number[];
  deletedIndividualRelationshipIds: number[];
}

export interface RelationshipMutation {
  changeType: ChangeType;
  relationship: Relationship;
}

export interface IndividualMutation {
  changeType: ChangeType;
  individual: Individual;
  deletedIndividualRelationshipIds: number[];
}

export interface IndividualRelationshipMutation {
  changeType: ChangeType;
  individualRelationship: IndividualRelationship;
}

function requireText(field: string, value: string | undefined): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new GraphError('ValidationFailed', `${field} must not be empty`);
  }
  return trimmed;
}

/**
 * In-memory graph of a single ontology.
 *
 * Every apply* method validates the whole change before touching any row, so
 * a thrown GraphError means nothing changed. Structural invariants enforced
 * here: unique ids, relationship endpoints are existing concepts, individuals
 * are typed by existing concepts, individual relationships join existing
 * individuals. Group invariants belong to the grouping engine; this class only
 * stores groups.
 */
export class OntologyGraph {
  private readonly concepts: EntityTable<Concept>;
  private readonly relationships: EntityTable<Relationship>;
  private readonly individuals: EntityTable<Individual>;
  private readonly individualRelationships: EntityTable<IndividualRelationship>;
  private readonly groups: EntityTable<ConceptGroup>;
  private currentSequence: number;

  private constructor(
    readonly ontologyId: number,
    seed: Omit<GraphSnapshot, 'ontologyId'>,
  ) {
    this.concepts = new EntityTable('Concept', seed.concepts);
    this.relationships = new EntityTable('Relationship', seed.relationships);
    this.individuals = new EntityTable('Individual', seed.individuals);
    this.individualRelationships = new EntityTable(
      'IndividualRelationship',
      seed.individualRelationships,
    );
    this.groups = new EntityTable('ConceptGroup', seed.groups);
    this.currentSequence = seed.sequence;
  }

  static empty(ontologyId: number): OntologyGraph {
    return new OntologyGraph(ontologyId, {
      sequence: 0,
      concepts: [],
      relationships: [],
      individuals: [],
      individualRelationships: [],
      groups: [],
    });
  }

  /** Rebuilds a graph from stored rows, rejecting dangling references. */
  static fromSnapshot(snapshot: GraphSnapshot): OntologyGraph {
    const graph = new OntologyGraph(snapshot.ontologyId, snapshot);
    graph.assertReferences();
    return graph;
  }

  get sequence(): number {
    return this.currentSequence;
  }

  nextSequence(): number {
    this.currentSequence += 1;
    return this.currentSequence;
  }

  // ============================================
  // READS (copy-on-read)
  // ============================================

  snapshot(): GraphSnapshot {
    return {
      ontologyId: this.ontologyId,
      sequence: this.currentSequence,
      concepts: this.concepts.values(),
      relationships: this.relationships.values(),
      individuals: this.individuals.values(),
      individualRelationships: this.individualRelationships.values(),
      groups: this.groups.values(),
    };
  }

  hasConcept(id: number): boolean {
    return this.concepts.has(id);
  }

  hasRelationship(id: number): boolean {
    return this.relationships.has(id);
  }

  getConcept(id: number): Concept | undefined {
    return this.concepts.get(id);
  }

  getRelationship(id: number): Relationship | undefined {
    return this.relationships.get(id);
  }

  getIndividual(id: number): Individual | undefined {
    return this.individuals.get(id);
  }

  getGroup(id: number): ConceptGroup | undefined {
    return this.groups.get(id);
  }

  listConcepts(): Concept[] {
    return this.concepts.values();
  }

  listGroups(): ConceptGroup[] {
    return this.groups.values();
  }

  /** Relationships with at least one endpoint in `conceptIds`, by id. */
  relationshipsTouching(conceptIds: ReadonlySet<number>): Relationship[] {
    return this.relationships
      .peekAll()
      .filter(
        (r) =>
          conceptIds.has(r.sourceConceptId) || conceptIds.has(r.targetConceptId),
      )
      .map((r) => structuredClone(r));
  }

  // ============================================
  // CONCEPTS
  // ============================================

  applyConceptChange(change: ConceptChange, now: Date): ConceptMutation {
    switch (change.op) {
      case 'create': {
        const id = this.concepts.allocateId(change.id);
        const concept = this.concepts.put({
          id,
          ontologyId: this.ontologyId,
          version: 1,
          createdAt: now,
          updatedAt: now,
          ...this.conceptFields(change.fields),
        });
        return this.conceptResult('added', concept);
      }
      case 'update': {
        const current = this.concepts.require(change.id);
        assertVersion('Concept', current, change.expectedVersion);
        const merged = { ...current, ...change.fields };
        const concept = this.concepts.put({
          ...merged,
          ...this.conceptFields(merged),
          version: current.version + 1,
          updatedAt: now,
        });
        return this.conceptResult('updated', concept);
      }
      case 'delete': {
        const current = this.concepts.require(change.id);
        assertVersion('Concept', current, change.expectedVersion);

        const deletedRelationshipIds = this.relationships
          .peekAll()
          .filter(
            (r) =>
              r.sourceConceptId === change.id || r.targetConceptId === change.id,
          )
          .map((r) => r.id);
        const deletedIndividualIds = this.individuals
          .peekAll()
          .filter((i) => i.conceptTypeId === change.id)
          .map((i) => i.id);
        const deletedIndividualRelationshipIds =
          this.individualRelationshipsTouching(new Set(deletedIndividualIds));

        deletedRelationshipIds.forEach((id) => this.relationships.delete(id));
        deletedIndividualRelationshipIds.forEach((id) =>
          this.individualRelationships.delete(id),
        );
        deletedIndividualIds.forEach((id) => this.individuals.delete(id));
        const concept = this.concepts.delete(change.id);

        return {
          changeType: 'deleted',
          concept,
          deletedRelationshipIds,
          deletedIndividualIds,
          deletedIndividualRelationshipIds,
        };
      }
    }
  }

  /** Layout-only update; still versioned so clients can detect it. */
  moveConcept(id: number, x: number, y: number, now: Date): Concept {
    const current = this.concepts.require(id);
    return this.concepts.put({
      ...current,
      positionX: x,
      positionY: y,
      version: current.version + 1,
      updatedAt: now,
    });
  }

  private conceptFields(
    fields: Partial<ConceptFields>,
  ): Omit<Concept, keyof EntityMeta> {
    return {
      name: requireText('Concept name', fields.name),
      category: fields.category ?? null,
      color: fields.color ?? null,
      definition: fields.definition ?? null,
      positionX: fields.positionX ?? null,
      positionY: fields.positionY ?? null,
    };
  }

  private conceptResult(changeType: ChangeType, concept: Concept): ConceptMutation {
    return {
      changeType,
      concept,
      deletedRelationshipIds: [],
      deletedIndividualIds: [],
      deletedIndividualRelationshipIds: [],
    };
  }

  // ============================================
  // RELATIONSHIPS
  // ============================================

  applyRelationshipChange(
    change: RelationshipChange,
    now: Date,
  ): RelationshipMutation {
    switch (change.op) {
      case 'create': {
        const id = this.relationships.allocateId(change.id);
        this.assertConceptEndpoints(
          change.fields.sourceConceptId,
          change.fields.targetConceptId,
        );
        const relationship = this.relationships.put({
          id,
          ontologyId: this.ontologyId,
          version: 1,
          createdAt: now,
          updatedAt: now,
          sourceConceptId: change.fields.sourceConceptId,
          targetConceptId: change.fields.targetConceptId,
          relationType: requireText('Relation type', change.fields.relationType),
          label: change.fields.label ?? null,
        });
        return { changeType: 'added', relationship };
      }
      case 'update': {
        const current = this.relationships.require(change.id);
        assertVersion('Relationship', current, change.expectedVersion);
        const merged = { ...current, ...change.fields };
        this.assertConceptEndpoints(merged.sourceConceptId, merged.targetConceptId);
        const relationship = this.relationships.put({
          ...merged,
          relationType: requireText('Relation type', merged.relationType),
          label: merged.label ?? null,
          version: current.version + 1,
          updatedAt: now,
        });
        return { changeType: 'updated', relationship };
      }
      case 'delete': {
        const current = this.relationships.require(change.id);
        assertVersion('Relationship', current, change.expectedVersion);
        return {
          changeType: 'deleted',
          relationship: this.relationships.delete(change.id),
        };
      }
    }
  }

  private assertConceptEndpoints(sourceId: number, targetId: number): void {
    for (const id of [sourceId, targetId]) {
      if (!this.concepts.has(id)) {
        throw new GraphError(
          'InvalidReference',
          `Relationship endpoint concept ${id} does not exist in ontology ${this.ontologyId}`,
        );
      }
    }
  }

  // ============================================
  // INDIVIDUALS
  // ============================================

  applyIndividualChange(change: IndividualChange, now: Date): IndividualMutation {
    switch (change.op) {
      case 'create': {
        const id = this.individuals.allocateId(change.id);
        this.assertConceptType(change.fields.conceptTypeId);
        const individual = this.individuals.put({
          id,
          ontologyId: this.ontologyId,
          version: 1,
          createdAt: now,
          updatedAt: now,
          conceptTypeId: change.fields.conceptTypeId,
          name: requireText('Individual name', change.fields.name),
          label: change.fields.label ?? null,
          description: change.fields.description ?? null,
        });
        return { changeType: 'added', individual, deletedIndividualRelationshipIds: [] };
      }
      case 'update': {
        const current = this.individuals.require(change.id);
        assertVersion('Individual', current, change.expectedVersion);
        const merged = { ...current, ...change.fields };
        this.assertConceptType(merged.conceptTypeId);
        const individual = this.individuals.put({
          ...merged,
          name: requireText('Individual name', merged.name),
          label: merged.label ?? null,
          description: merged.description ?? null,
          version: current.version + 1,
          updatedAt: now,
        });
        return { changeType: 'updated', individual, deletedIndividualRelationshipIds: [] };
      }
      case 'delete': {
        const current = this.individuals.require(change.id);
        assertVersion('Individual', current, change.expectedVersion);
        const deletedIndividualRelationshipIds =
          this.individualRelationshipsTouching(new Set([change.id]));
        deletedIndividualRelationshipIds.forEach((id) =>
          this.individualRelationships.delete(id),
        );
        return {
          changeType: 'deleted',
          individual: this.individuals.delete(change.id),
          deletedIndividualRelationshipIds,
        };
      }
    }
  }

  private assertConceptType(conceptId: number): void {
    if (!this.concepts.has(conceptId)) {
      throw new GraphError(
        'InvalidReference',
        `Individual type concept ${conceptId} does not exist in ontology ${this.ontologyId}`,
      );
    }
  }

  // ============================================
  // INDIVIDUAL RELATIONSHIPS
  // ============================================

  applyIndividualRelationshipChange(
    change: IndividualRelationshipChange,
    now: Date,
  ): IndividualRelationshipMutation {
    switch (change.op) {
      case 'create': {
        const id = this.individualRelationships.allocateId(change.id);
        this.assertIndividualEndpoints(
          change.fields.sourceIndividualId,
          change.fields.targetIndividualId,
        );
        const individualRelationship = this.individualRelationships.put({
          id,
          ontologyId: this.ontologyId,
          version: 1,
          createdAt: now,
          updatedAt: now,
          sourceIndividualId: change.fields.sourceIndividualId,
          targetIndividualId: change.fields.targetIndividualId,
          relationType: requireText('Relation type', change.fields.relationType),
        });
        return { changeType: 'added', individualRelationship };
      }
      case 'update': {
        const current = this.individualRelationships.require(change.id);
        assertVersion('IndividualRelationship', current, change.expectedVersion);
        const merged = { ...current, ...change.fields };
        this.assertIndividualEndpoints(
          merged.sourceIndividualId,
          merged.targetIndividualId,
        );
        const individualRelationship = this.individualRelationships.put({
          ...merged,
          relationType: requireText('Relation type', merged.relationType),
          version: current.version + 1,
          updatedAt: now,
        });
        return { changeType: 'updated', individualRelationship };
      }
      case 'delete': {
        const current = this.individualRelationships.require(change.id);
        assertVersion('IndividualRelationship', current, change.expectedVersion);
        return {
          changeType: 'deleted',
          individualRelationship: this.individualRelationships.delete(change.id),
        };
      }
    }
  }

  private assertIndividualEndpoints(sourceId: number, targetId: number): void {
    for (const id of [sourceId, targetId]) {
      if (!this.individuals.has(id)) {
        throw new GraphError(
          'InvalidReference',
          `Individual ${id} does not exist in ontology ${this.ontologyId}`,
        );
      }
    }
  }

  private individualRelationshipsTouching(
    individualIds: ReadonlySet<number>,
  ): number[] {
    return this.individualRelationships
      .peekAll()
      .filter(
        (r) =>
          individualIds.has(r.sourceIndividualId) ||
          individualIds.has(r.targetIndividualId),
      )
      .map((r) => r.id);
  }

  // ============================================
  // GROUP STORAGE
  // ============================================

  insertGroup(draft: GroupDraft, now: Date): ConceptGroup {
    return this.groups.put({
      ...draft,
      id: this.groups.allocateId(),
      ontologyId: this.ontologyId,
      version: 1,
      createdAt: now,
      updatedAt: now,
    });
  }

  replaceGroup(group: ConceptGroup, now: Date): ConceptGroup {
    const current = this.groups.require(group.id);
    return this.groups.put({
      ...group,
      ontologyId: this.ontologyId,
      createdAt: current.createdAt,
      version: current.version + 1,
      updatedAt: now,
    });
  }

  deleteGroup(id: number): ConceptGroup {
    if (!this.groups.has(id)) {
      throw new GraphError('GroupNotFound', `Group ${id} not found`);
    }
    return this.groups.delete(id);
  }

  // ============================================
  // PERSISTENCE
  // ============================================

  /** Rows changed since the previous call, for write-behind persistence. */
  takeDelta(): GraphDelta {
    return {
      concepts: this.concepts.takeDelta(),
      relationships: this.relationships.takeDelta(),
      individuals: this.individuals.takeDelta(),
      individualRelationships: this.individualRelationships.takeDelta(),
      groups: this.groups.takeDelta(),
    };
  }

  /** Puts a delta that storage rejected back into the change sets. */
  restoreDelta(delta: GraphDelta): void {
    this.concepts.restoreDelta(delta.concepts);
    this.relationships.restoreDelta(delta.relationships);
    this.individuals.restoreDelta(delta.individuals);
    this.individualRelationships.restoreDelta(delta.individualRelationships);
    this.groups.restoreDelta(delta.groups);
  }

  private assertReferences(): void {
    for (const r of this.relationships.peekAll()) {
      this.assertConceptEndpoints(r.sourceConceptId, r.targetConceptId);
    }
    for (const i of this.individuals.peekAll()) {
      this.assertConceptType(i.conceptTypeId);
    }
    for (const r of this.individualRelationships.peekAll()) {
      this.assertIndividualEndpoints(r.sourceIndividualId, r.targetIndividualId);
    }
    for (const g of this.groups.peekAll()) {
      for (const id of [g.parentConceptId, ...g.childConceptIds]) {
        if (!this.concepts.has(id)) {
          throw new GraphError(
            'InvalidReference',
            `Group ${g.id} references missing concept ${id}`,
          );
        }
      }
    }
  }
}
