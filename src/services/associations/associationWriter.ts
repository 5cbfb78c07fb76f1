import type {
  EventEntityLink,
  RawEventEntityLink,
  ViewpointEventLink,
} from '../../types/chronicle';
import { createLogger } from '../../utils/logger';
import type { StoreSession } from '../storage/interface';

const log = createLogger('associations');

function uniquePairs<T>(rows: T[], key: (row: T) => string): T[] {
  const seen = new Map<string, T>();
  for (const row of rows) {
    const k = key(row);
    if (!seen.has(k)) seen.set(k, row);
  }
  return [...seen.values()];
}

/**
 * Link events to entities in one write. Pairs that already exist,
 * in the store or earlier in `pairs`, are skipped.
 */
export async function linkEventEntities(
  session: StoreSession,
  pairs: EventEntityLink[]
): Promise<void> {
  if (pairs.length === 0) return;
  const rows = uniquePairs(pairs, (p) => `${p.eventId}:${p.entityId}`);
  await session.eventEntityLinks.bulkInsertIgnoreConflict(rows);
  log.debug({ count: rows.length }, 'Linked events to entities');
}

export async function linkViewpointEvents(
  session: StoreSession,
  pairs: ViewpointEventLink[]
): Promise<void> {
  if (pairs.length === 0) return;
  const rows = uniquePairs(pairs, (p) => `${p.viewpointId}:${p.eventId}`);
  await session.viewpointEventLinks.bulkInsertIgnoreConflict(rows);
  log.debug({ count: rows.length }, 'Linked viewpoint to events');
}

export async function linkRawEventEntities(
  session: StoreSession,
  pairs: RawEventEntityLink[]
): Promise<void> {
  if (pairs.length === 0) return;
  const rows = uniquePairs(pairs, (p) => `${p.rawEventId}:${p.entityId}`);
  await session.rawEventEntityLinks.bulkInsertIgnoreConflict(rows);
}

/** @returns whether a new link row was written */
export async function linkEventRawEvent(
  session: StoreSession,
  eventId: string,
  rawEventId: string
): Promise<boolean> {
  const link = { eventId, rawEventId };
  if (await session.eventRawEventLinks.exists(link)) {
    return false;
  }
  await session.eventRawEventLinks.bulkInsertIgnoreConflict([link]);
  return true;
}
