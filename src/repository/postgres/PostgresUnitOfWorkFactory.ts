import { withTransaction, type Queryable } from '@observatory/shared';

import type { UnitOfWork, UnitOfWorkFactory } from '../interfaces';
import { PostgresBookingRepository } from './PostgresBookingRepository';
import { PostgresConfigurationRepository } from './PostgresConfigurationRepository';
import { PostgresSlotRepository } from './PostgresSlotRepository';
import { PostgresUserRepository } from './PostgresUserRepository';

export function createPostgresUnitOfWork(db: Queryable): UnitOfWork {
  return {
    slots: new PostgresSlotRepository(db),
    bookings: new PostgresBookingRepository(db),
    users: new PostgresUserRepository(db),
    configuration: new PostgresConfigurationRepository(db)
  };
}

export class PostgresUnitOfWorkFactory implements UnitOfWorkFactory {
  async withTransaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return withTransaction((client) => work(createPostgresUnitOfWork(client)));
  }
}
