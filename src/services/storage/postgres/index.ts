import { db } from '../../../config/database';
import type { Store, StoreSession } from '../interface';
import {
  PgEventEntityLinkRepository,
  PgEventRawEventLinkRepository,
  PgRawEventEntityLinkRepository,
  PgViewpointEventLinkRepository,
} from './associationRepositories';
import type { Executor } from './base';
import { PgEntityRepository } from './entityRepository';
import { PgEventRepository } from './eventRepository';
import { PgRawEventRepository } from './rawEventRepository';
import { PgSourceDocumentRepository } from './sourceDocumentRepository';

function createSession(tx: Executor): StoreSession {
  return {
    entities: new PgEntityRepository(tx),
    sourceDocuments: new PgSourceDocumentRepository(tx),
    rawEvents: new PgRawEventRepository(tx),
    events: new PgEventRepository(tx),
    eventEntityLinks: new PgEventEntityLinkRepository(tx),
    eventRawEventLinks: new PgEventRawEventLinkRepository(tx),
    rawEventEntityLinks: new PgRawEventEntityLinkRepository(tx),
    viewpointEventLinks: new PgViewpointEventLinkRepository(tx),
    // drizzle issues SAVEPOINT / ROLLBACK TO SAVEPOINT for nested transactions
    savepoint: <T>(fn: (session: StoreSession) => Promise<T>) =>
      tx.transaction((nested) => fn(createSession(nested))),
  };
}

export class PgStore implements Store {
  constructor(private readonly database: Executor) {}

  transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    return this.database.transaction((tx) => fn(createSession(tx)));
  }
}

export function createPostgresStore(database: Executor = db): Store {
  return new PgStore(database);
}

export { PgEntityRepository, PgEventRepository, PgRawEventRepository, PgSourceDocumentRepository };
