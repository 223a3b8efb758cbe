import { Injectable } from '@nestjs/common';
import { Selectable } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { DB } from '../../db/types';
import { DomainUser } from './domain.types';

type UserRow = Selectable<DB['users']>;

@Injectable()
export class UserRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  async findById(id: string): Promise<DomainUser | null> {
    const res = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('users')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst(),
    );
    return res ? this.mapToDomainUser(res) : null;
  }

  async findManyByIds(ids: string[]): Promise<DomainUser[]> {
    if (ids.length === 0) return [];
    const res = await this.databaseService.db.executeRead((trx) =>
      trx.selectFrom('users').selectAll().where('id', 'in', ids).execute(),
    );
    return res.map((row) => this.mapToDomainUser(row));
  }

  private mapToDomainUser(row: UserRow): DomainUser {
    return {
      id: row.id,
      displayName: row.display_name,
      email: row.email,
      createdAt: row.created_at,
    };
  }
}
