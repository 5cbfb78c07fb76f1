import { CONTEXT_SNIPPET_LIMIT, EMBEDDING_TEXT_SEPARATOR } from '../../config/constants';
import type { EntityDescriptor } from '../../types/chronicle';

export interface EmbeddableRawEvent {
  description: string;
  dateStr?: string | null;
  sourceTextSnippet?: string | null;
}

function describeEntity(entity: EntityDescriptor): string | null {
  const name = entity.name.trim();
  if (!name) return null;
  const type = entity.entityType?.trim();
  return type ? `${name} (${type})` : name;
}

/**
 * Text a raw event is embedded from:
 * `description | Date: … | Entities: a (T), b | Context: <first 200 chars>`.
 * Absent parts are left out along with their separator.
 */
export function buildEventEmbeddingText(
  rawEvent: EmbeddableRawEvent,
  entities: EntityDescriptor[] = []
): string {
  const parts: string[] = [];

  const description = rawEvent.description.trim();
  if (description) {
    parts.push(description);
  }

  if (rawEvent.dateStr) {
    parts.push(`Date: ${rawEvent.dateStr}`);
  }

  const entityParts = entities
    .map(describeEntity)
    .filter((part): part is string => part !== null);
  if (entityParts.length > 0) {
    parts.push(`Entities: ${entityParts.join(', ')}`);
  }

  if (rawEvent.sourceTextSnippet) {
    parts.push(`Context: ${rawEvent.sourceTextSnippet.slice(0, CONTEXT_SNIPPET_LIMIT)}`);
  }

  return parts.join(EMBEDDING_TEXT_SEPARATOR);
}
