import { beforeEach, describe, expect, test, vi } from 'vitest';
import { CanonicalEventResolver } from '../../services/canonicalEvents';
import { processDocumentEvents } from '../../services/pipeline';
import type { StoreSession } from '../../services/storage/interface';
import type { SourceDocument } from '../../types/chronicle';
import { ValidationError } from '../../utils/errors';
import { createTestEntity, createTestSourceDocument } from '../helpers/factories';
import { MemoryStore } from '../helpers/memoryStore';
import { BASE_VECTOR, FakeEmbeddingProvider, vectorWithSimilarity } from '../helpers/mocks';

const VIEWPOINT_ID = '22222222-2222-4222-8222-222222222222';

describe('processDocumentEvents', () => {
  let store: MemoryStore;
  let session: StoreSession;
  let provider: FakeEmbeddingProvider;
  let document: SourceDocument;

  beforeEach(async () => {
    store = new MemoryStore();
    session = store.session;
    provider = new FakeEmbeddingProvider(2)
      .register('Battle of Austerlitz', BASE_VECTOR)
      .register('The battle at Austerlitz', vectorWithSimilarity(0.97))
      .register('Harvest festival', vectorWithSimilarity(0.4));
    document = await createTestSourceDocument(session);
  });

  test('stages, resolves and links one document', async () => {
    const entity = await createTestEntity(session, { name: 'Napoleon' });

    const result = await processDocumentEvents(
      session,
      {
        sourceDocument: document,
        viewpointId: VIEWPOINT_ID,
        events: [
          { description: 'Battle of Austerlitz', dateStr: '1805-12-02', entityIds: [entity.id] },
          { description: 'The battle at Austerlitz', dateStr: '1805-12-02' },
          { description: 'Harvest festival', dateStr: '1805-09' },
        ],
      },
      { embeddingProvider: provider, dimensions: 2 }
    );

    const [merged, separate] = store.tables.events;
    expect(store.tables.events).toHaveLength(2);
    expect(result).toEqual({
      eventIds: [merged.id, separate.id],
      rawEventCount: 3,
      newRawEventCount: 3,
      unresolvedRawEventIds: [],
    });
    expect(store.tables.eventRawEventLinks).toHaveLength(3);
    expect(store.tables.eventEntityLinks).toEqual([{ eventId: merged.id, entityId: entity.id }]);
    expect(store.tables.viewpointEventLinks).toEqual([
      { viewpointId: VIEWPOINT_ID, eventId: merged.id },
      { viewpointId: VIEWPOINT_ID, eventId: separate.id },
    ]);
    expect(store.tables.sourceDocuments[0].processingStatus).toBe('completed');
  });

  test('writes no viewpoint links without a viewpoint', async () => {
    const result = await processDocumentEvents(
      session,
      { sourceDocument: document, events: [{ description: 'Harvest festival', dateStr: '1805-09' }] },
      { embeddingProvider: provider, dimensions: 2 }
    );

    expect(result.eventIds).toHaveLength(1);
    expect(store.tables.viewpointEventLinks).toEqual([]);
  });

  test('keeps a partly resolved document open and finishes it on the next run', async () => {
    vi.spyOn(session.events, 'create').mockRejectedValueOnce(new Error('disk full'));
    const input = {
      sourceDocument: document,
      events: [
        { description: 'Battle of Austerlitz', dateStr: '1805-12-02' },
        { description: 'Harvest festival', dateStr: '1805-09' },
      ],
    };
    const deps = { embeddingProvider: provider, dimensions: 2 };

    const first = await processDocumentEvents(session, input, deps);

    const [battle] = store.tables.rawEvents;
    const [harvest] = store.tables.events;
    expect(harvest.description).toBe('Harvest festival');
    expect(first.eventIds).toEqual([harvest.id]);
    expect(first.unresolvedRawEventIds).toEqual([battle.id]);
    expect(store.tables.sourceDocuments[0].processingStatus).toBe('processing_linking');

    const [stored] = store.tables.sourceDocuments;
    const second = await processDocumentEvents(session, { ...input, sourceDocument: stored }, deps);

    const battleEvent = store.tables.events[1];
    expect(battleEvent.description).toBe('Battle of Austerlitz');
    expect(second).toEqual({
      eventIds: [battleEvent.id, harvest.id],
      rawEventCount: 2,
      newRawEventCount: 0,
      unresolvedRawEventIds: [],
    });
    expect(store.tables.events).toHaveLength(2);
    expect(store.tables.sourceDocuments[0].processingStatus).toBe('completed');
  });

  test('uses the resolver it is given', async () => {
    const resolver = new CanonicalEventResolver({ embeddingProvider: provider, dimensions: 2 });

    await processDocumentEvents(
      session,
      { sourceDocument: document, events: [{ description: 'Harvest festival', dateStr: '1805-09' }] },
      { resolver }
    );

    expect(resolver.getStats().newEventsCreated).toBe(1);
  });

  test('refuses to reprocess a completed document', async () => {
    const completed = await createTestSourceDocument(session, { processingStatus: 'completed' });

    await expect(
      processDocumentEvents(
        session,
        { sourceDocument: completed, events: [] },
        { embeddingProvider: provider, dimensions: 2 }
      )
    ).rejects.toThrow(ValidationError);
  });
});
