import { Injectable } from '@nestjs/common';
import { Kysely, Selectable } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { DB } from '../../db/types';
import { DomainOntology, DomainShare, PermissionLevel } from './domain.types';

type OntologyRow = Selectable<DB['ontologies']>;
type ShareRow = Selectable<DB['ontology_shares']>;

const LEVELS: readonly PermissionLevel[] = [
  PermissionLevel.View,
  PermissionLevel.ViewAndAdd,
  PermissionLevel.ViewAddEdit,
  PermissionLevel.FullAccess,
];

@Injectable()
export class OntologyRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  // ============================================
  // READ OPERATIONS
  // ============================================

  async findById(id: number): Promise<DomainOntology | null> {
    const res = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('ontologies')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst(),
    );
    return res ? this.mapToDomainOntology(res) : null;
  }

  async findActiveShare(
    ontologyId: number,
    userId: string,
  ): Promise<DomainShare | null> {
    const res = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('ontology_shares')
        .selectAll()
        .where('ontology_id', '=', ontologyId)
        .where('user_id', '=', userId)
        .where('is_active', '=', 1)
        .executeTakeFirst(),
    );
    return res ? this.mapToDomainShare(res) : null;
  }

  // ============================================
  // WRITE OPERATIONS
  // ============================================

  async updateGraphSequence(
    id: number,
    sequence: number,
    db: Kysely<DB> = this.databaseService.db.write(),
  ): Promise<void> {
    await db
      .updateTable('ontologies')
      .set({ graph_sequence: sequence, updated_at: new Date() })
      .where('id', '=', id)
      .execute();
  }

  private mapToDomainOntology(row: OntologyRow): DomainOntology {
    return {
      id: row.id,
      name: row.name,
      ownerId: row.owner_id,
      visibility: row.visibility,
      allowPublicEdit: row.allow_public_edit === 1,
      graphSequence: Number(row.graph_sequence),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private mapToDomainShare(row: ShareRow): DomainShare | null {
    const permissionLevel = LEVELS.find((l) => l === row.permission_level);
    // Unknown levels grant nothing
    if (permissionLevel === undefined) return null;
    return {
      ontologyId: row.ontology_id,
      userId: row.user_id,
      permissionLevel,
      isActive: row.is_active === 1,
    };
  }
}
