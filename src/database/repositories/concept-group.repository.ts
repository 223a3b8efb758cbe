import { Injectable } from '@nestjs/common';
import { Kysely, Selectable } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { DB } from '../../db/types';
import {
  CollapsedRelationship,
  ConceptGroup,
} from '../../graph-store/types/graph.types';

type ConceptGroupRow = Selectable<DB['concept_groups']>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isIdList = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((v) => Number.isInteger(v));

function isCollapsedRelationship(value: unknown): value is CollapsedRelationship {
  if (!isRecord(value)) return false;
  return (
    typeof value.relationshipId === 'number' &&
    typeof value.relationType === 'string' &&
    typeof value.fromConceptId === 'number' &&
    typeof value.toConceptId === 'number' &&
    (value.externalConceptId === null ||
      typeof value.externalConceptId === 'number') &&
    typeof value.isFromGroupedChild === 'boolean' &&
    typeof value.isToGroupedChild === 'boolean' &&
    typeof value.shouldBeRerouted === 'boolean'
  );
}

@Injectable()
export class ConceptGroupRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  async findByOntology(
    ontologyId: number,
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<ConceptGroup[]> {
    const res = await db
      .selectFrom('concept_groups')
      .selectAll()
      .where('ontology_id', '=', ontologyId)
      .orderBy('id', 'asc')
      .execute();
    return res.map((row) => this.mapToDomainGroup(row));
  }

  async upsertMany(
    groups: ConceptGroup[],
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<void> {
    for (const g of groups) {
      const values = {
        created_by: g.createdBy,
        parent_concept_id: g.parentConceptId,
        child_concept_ids: JSON.stringify(g.childConceptIds),
        collapsed_relationships: JSON.stringify(g.collapsedRelationships),
        is_collapsed: g.isCollapsed ? 1 : 0,
        group_name: g.groupName,
        version: g.version,
        updated_at: g.updatedAt,
      };
      await db
        .insertInto('concept_groups')
        .values({
          ...values,
          ontology_id: g.ontologyId,
          id: g.id,
          created_at: g.createdAt,
        })
        .onDuplicateKeyUpdate(values)
        .execute();
    }
  }

  async deleteMany(
    ontologyId: number,
    ids: number[],
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<void> {
    if (ids.length === 0) return;
    await db
      .deleteFrom('concept_groups')
      .where('ontology_id', '=', ontologyId)
      .where('id', 'in', ids)
      .execute();
  }

  private mapToDomainGroup(row: ConceptGroupRow): ConceptGroup {
    const childConceptIds: unknown = JSON.parse(row.child_concept_ids);
    const records: unknown = JSON.parse(row.collapsed_relationships);
    if (!isIdList(childConceptIds)) {
      throw new Error(`Group ${row.id}: malformed child_concept_ids`);
    }
    if (!Array.isArray(records) || !records.every(isCollapsedRelationship)) {
      throw new Error(`Group ${row.id}: malformed collapsed_relationships`);
    }

    return {
      id: row.id,
      ontologyId: row.ontology_id,
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      createdBy: row.created_by,
      parentConceptId: row.parent_concept_id,
      childConceptIds,
      isCollapsed: row.is_collapsed === 1,
      collapsedRelationships: records,
      groupName: row.group_name,
    };
  }
}
