import { Injectable } from '@nestjs/common';
import { Kysely, Selectable } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { DB } from '../../db/types';
import { Individual } from '../../graph-store/types/graph.types';

type IndividualRow = Selectable<DB['individuals']>;

@Injectable()
export class IndividualRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  async findByOntology(
    ontologyId: number,
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<Individual[]> {
    const res = await db
      .selectFrom('individuals')
      .selectAll()
      .where('ontology_id', '=', ontologyId)
      .orderBy('id', 'asc')
      .execute();
    return res.map((row) => this.mapToDomainIndividual(row));
  }

  async upsertMany(
    individuals: Individual[],
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<void> {
    for (const i of individuals) {
      const values = {
        concept_type_id: i.conceptTypeId,
        name: i.name,
        label: i.label,
        description: i.description,
        version: i.version,
        updated_at: i.updatedAt,
      };
      await db
        .insertInto('individuals')
        .values({
          ...values,
          ontology_id: i.ontologyId,
          id: i.id,
          created_at: i.createdAt,
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
      .deleteFrom('individuals')
      .where('ontology_id', '=', ontologyId)
      .where('id', 'in', ids)
      .execute();
  }

  private mapToDomainIndividual(row: IndividualRow): Individual {
    return {
      id: row.id,
      ontologyId: row.ontology_id,
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      conceptTypeId: row.concept_type_id,
      name: row.name,
      label: row.label,
      description: row.description,
    };
  }
}
