/**
 * Dental Clinic API - Database Service
 *
 * Thin wrapper around the TypeORM DataSource. Reads go through
 * `getRepository`, every write runs inside `withTransaction`.
 */

import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager, EntityTarget, ObjectLiteral, Repository } from 'typeorm';

@Injectable()
export class DatabaseService {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  getRepository<Entity extends ObjectLiteral>(entity: EntityTarget<Entity>): Repository<Entity> {
    return this.dataSource.getRepository(entity);
  }

  /**
   * Execute a callback within a single database transaction.
   *
   * @param work - The database operations to execute
   */
  async withTransaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.dataSource.transaction(work);
  }

  /**
   * Used by the readiness probe.
   */
  async ping(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    await this.dataSource.query('SELECT 1');
    return true;
  }
}
