import { Injectable } from '@nestjs/common';
import { Kysely, Selectable } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { DB } from '../../db/types';
import { Concept } from '../../graph-store/types/graph.types';

type ConceptRow = Selectable<DB['concepts']>;

@Injectable()
export class ConceptRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  // ============================================
  // READ OPERATIONS
  // ============================================

  async findByOntology(
    ontologyId: number,
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<Concept[]> {
    const res = await db
      .selectFrom('concepts')
      .selectAll()
      .where('ontology_id', '=', ontologyId)
      .orderBy('id', 'asc')
      .execute();
    return res.map((row) => this.mapToDomainConcept(row));
  }

  // ============================================
  // WRITE OPERATIONS (Primary, usually inside a transaction)
  // ============================================

  async upsertMany(
    concepts: Concept[],
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<void> {
    for (const c of concepts) {
      const values = {
        name: c.name,
        category: c.category,
        color: c.color,
        definition: c.definition,
        position_x: c.positionX,
        position_y: c.positionY,
        version: c.version,
        updated_at: c.updatedAt,
      };
      await db
        .insertInto('concepts')
        .values({
          ...values,
          ontology_id: c.ontologyId,
          id: c.id,
          created_at: c.createdAt,
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
      .deleteFrom('concepts')
      .where('ontology_id', '=', ontologyId)
      .where('id', 'in', ids)
      .execute();
  }

  private mapToDomainConcept(row: ConceptRow): Concept {
    return {
      id: row.id,
      ontologyId: row.ontology_id,
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      name: row.name,
      category: row.category,
      color: row.color,
      definition: row.definition,
      positionX: row.position_x,
      positionY: row.position_y,
    };
  }
}
