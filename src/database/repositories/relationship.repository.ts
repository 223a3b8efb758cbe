import { Injectable } from '@nestjs/common';
import { Kysely, Selectable } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { DB } from '../../db/types';
import { Relationship } from '../../graph-store/types/graph.types';

type RelationshipRow = Selectable<DB['relationships']>;

@Injectable()
export class RelationshipRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  async findByOntology(
    ontologyId: number,
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<Relationship[]> {
    const res = await db
      .selectFrom('relationships')
      .selectAll()
      .where('ontology_id', '=', ontologyId)
      .orderBy('id', 'asc')
      .execute();
    return res.map((row) => this.mapToDomainRelationship(row));
  }

  async upsertMany(
    relationships: Relationship[],
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<void> {
    for (const r of relationships) {
      const values = {
        source_concept_id: r.sourceConceptId,
        target_concept_id: r.targetConceptId,
        relation_type: r.relationType,
        label: r.label,
        version: r.version,
        updated_at: r.updatedAt,
      };
      await db
        .insertInto('relationships')
        .values({
          ...values,
          ontology_id: r.ontologyId,
          id: r.id,
          created_at: r.createdAt,
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
      .deleteFrom('relationships')
      .where('ontology_id', '=', ontologyId)
      .where('id', 'in', ids)
      .execute();
  }

  private mapToDomainRelationship(row: RelationshipRow): Relationship {
    return {
      id: row.id,
      ontologyId: row.ontology_id,
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      sourceConceptId: row.source_concept_id,
      targetConceptId: row.target_concept_id,
      relationType: row.relation_type,
      label: row.label,
    };
  }
}
