/**
 * backend/src/shared/db/unit-of-work.ts
 *
 * WHY:
 * - Services own transactions, but they should not know about Kysely to do so.
 * - A unit of work hands the service a set of repos bound to ONE transaction;
 *   everything inside `run` commits or rolls back together (writes + audit records).
 *
 * HOW TO USE:
 * - new KyselyUnitOfWork(db, (trx) => ({ rows: rowRepo.withDb(trx), audit: auditRepo.withDb(trx) }))
 * - await uow.run(async (tx) => { ... tx.rows ... tx.audit ... })
 *
 * RULES:
 * - No business logic here.
 * - Repos handed to `work` must not escape it.
 */

import type { Db, DbExecutor } from './db';

export interface UnitOfWork<TRepos> {
  run<T>(work: (repos: TRepos) => Promise<T>): Promise<T>;
}

export class KyselyUnitOfWork<TRepos> implements UnitOfWork<TRepos> {
  constructor(
    private readonly db: Db,
    private readonly bind: (trx: DbExecutor) => TRepos,
  ) {}

  async run<T>(work: (repos: TRepos) => Promise<T>): Promise<T> {
    return this.db.transaction().execute(async (trx) => work(this.bind(trx)));
  }
}
