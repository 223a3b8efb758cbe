import { Injectable } from '@nestjs/common';
import { Kysely, Selectable } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { DB } from '../../db/types';
import { IndividualRelationship } from '../../graph-store/types/graph.types';

type IndividualRelationshipRow = Selectable<DB['individual_relationships']>;

@Injectable()
export class IndividualRelationshipRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  async findByOntology(
    ontologyId: number,
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<IndividualRelationship[]> {
    const res = await db
      .selectFrom('individual_relationships')
      .selectAll()
      .where('ontology_id', '=', ontologyId)
      .orderBy('id', 'asc')
      .execute();
    return res.map((row) => this.mapToDomain(row));
  }

  async upsertMany(
    links: IndividualRelationship[],
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<void> {
    for (const link of links) {
      const values = {
        source_individual_id: link.sourceIndividualId,
        target_individual_id: link.targetIndividualId,
        relation_type: link.relationType,
        version: link.version,
        updated_at: link.updatedAt,
      };
      await db
        .insertInto('individual_relationships')
        .values({
          ...values,
          ontology_id: link.ontologyId,
          id: link.id,
          created_at: link.createdAt,
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
      .deleteFrom('individual_relationships')
      .where('ontology_id', '=', ontologyId)
      .where('id', 'in', ids)
      .execute();
  }

  private mapToDomain(row: IndividualRelationshipRow): IndividualRelationship {
    return {
      id: row.id,
      ontologyId: row.ontology_id,
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      sourceIndividualId: row.source_individual_id,
      targetIndividualId: row.target_individual_id,
      relationType: row.relation_type,
    };
  }
}
