import { randomUUID } from 'node:crypto';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import {
  linkEventEntities,
  linkEventRawEvent,
  linkRawEventEntities,
  linkViewpointEvents,
} from '../../services/associations';
import type { StoreSession } from '../../services/storage/interface';
import { MemoryStore } from '../helpers/memoryStore';

describe('association writer', () => {
  let store: MemoryStore;
  let session: StoreSession;
  const eventId = randomUUID();
  const entityId = randomUUID();
  const otherEntityId = randomUUID();

  beforeEach(() => {
    store = new MemoryStore();
    session = store.session;
  });

  describe('linkEventEntities', () => {
    test('writes each pair once across repeated calls', async () => {
      await linkEventEntities(session, [{ eventId, entityId }]);
      await linkEventEntities(session, [
        { eventId, entityId },
        { eventId, entityId: otherEntityId },
      ]);

      expect(store.tables.eventEntityLinks).toEqual([
        { eventId, entityId },
        { eventId, entityId: otherEntityId },
      ]);
    });

    test('collapses duplicates within one call into a single write', async () => {
      const insert = vi.spyOn(session.eventEntityLinks, 'bulkInsertIgnoreConflict');

      await linkEventEntities(session, [
        { eventId, entityId },
        { eventId, entityId },
      ]);

      expect(insert).toHaveBeenCalledTimes(1);
      expect(insert).toHaveBeenCalledWith([{ eventId, entityId }]);
    });

    test('does not touch the store for empty input', async () => {
      const insert = vi.spyOn(session.eventEntityLinks, 'bulkInsertIgnoreConflict');

      await linkEventEntities(session, []);

      expect(insert).not.toHaveBeenCalled();
    });
  });

  test('linkViewpointEvents ignores existing pairs', async () => {
    const viewpointId = randomUUID();

    await linkViewpointEvents(session, [{ viewpointId, eventId }]);
    await linkViewpointEvents(session, [{ viewpointId, eventId }]);

    expect(store.tables.viewpointEventLinks).toEqual([{ viewpointId, eventId }]);
  });

  test('linkRawEventEntities ignores existing pairs', async () => {
    const rawEventId = randomUUID();

    await linkRawEventEntities(session, [
      { rawEventId, entityId },
      { rawEventId, entityId },
    ]);
    await linkRawEventEntities(session, [{ rawEventId, entityId }]);

    expect(store.tables.rawEventEntityLinks).toEqual([{ rawEventId, entityId }]);
  });

  test('linkEventRawEvent reports whether it wrote a row', async () => {
    const rawEventId = randomUUID();

    expect(await linkEventRawEvent(session, eventId, rawEventId)).toBe(true);
    expect(await linkEventRawEvent(session, eventId, rawEventId)).toBe(false);
    expect(store.tables.eventRawEventLinks).toEqual([{ eventId, rawEventId }]);
  });
});
