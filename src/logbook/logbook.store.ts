import { Injectable } from '@nestjs/common';
import {
  DataSource,
  DeepPartial,
  EntityManager,
  EntityTarget,
  FindOptionsWhere,
  ObjectLiteral,
} from 'typeorm';

export interface UpsertResult<T> {
  entity: T;
  created: boolean;
}

/**
 * Store handle bound to one open transaction. Importers receive it from
 * {@link LogbookStore.transaction} and never reach the DataSource directly.
 */
export class LogbookTransaction {
  constructor(private readonly manager: EntityManager) {}

  /**
   * Update-or-create keyed by `where`. An existing row gets every field in
   * `values` overwritten; otherwise a new row is inserted from `values`, which
   * must therefore carry the key fields as well.
   */
  async upsert<T extends ObjectLiteral>(
    target: EntityTarget<T>,
    where: FindOptionsWhere<T>,
    values: DeepPartial<T>,
  ): Promise<UpsertResult<T>> {
    const repo = this.manager.getRepository(target);
    const existing = await repo.findOne({ where });

    if (existing) {
      repo.merge(existing, values);
      return { entity: await repo.save(existing), created: false };
    }

    const entity = await repo.save(repo.create(values));
    return { entity, created: true };
  }

  findOne<T extends ObjectLiteral>(
    target: EntityTarget<T>,
    where: FindOptionsWhere<T>,
  ): Promise<T | null> {
    return this.manager.getRepository(target).findOne({ where });
  }

  save<T extends ObjectLiteral>(target: EntityTarget<T>, entity: T): Promise<T> {
    return this.manager.getRepository(target).save(entity);
  }
}

@Injectable()
export class LogbookStore {
  constructor(private readonly dataSource: DataSource) {}

  /**
   * Runs `work` inside a single transaction. Concurrent upserts of the same
   * key serialize on the database's transaction lock.
   */
  transaction<R>(work: (tx: LogbookTransaction) => Promise<R>): Promise<R> {
    return this.dataSource.transaction((manager) =>
      work(new LogbookTransaction(manager)),
    );
  }

  count<T extends ObjectLiteral>(target: EntityTarget<T>): Promise<number> {
    return this.dataSource.getRepository(target).count();
  }
}
