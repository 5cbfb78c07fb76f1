// Canonical event resolution
export const CANDIDATE_LIMIT = 5;
export const SEARCH_SIMILARITY_FLOOR = 0.8;
export const SAME_SOURCE_THRESHOLD = 0.95;
export const CROSS_SOURCE_THRESHOLD = 0.85;

// Text limits
export const CONTEXT_SNIPPET_LIMIT = 200;
export const EXTRACT_LIMIT = 500;
export const EMBEDDING_TEXT_SEPARATOR = ' | ';

// Vector column width; must match the embedding provider's output
export const EMBEDDING_DIMENSIONS = 768;

// Entities
export const UNKNOWN_ENTITY_TYPE = 'UNKNOWN';
export const DEFAULT_VERIFICATION_SOURCE_TYPE = 'online_wikipedia';

// Disambiguation option parsing
export const MAX_DISAMBIGUATION_OPTIONS = 10;
export const MAX_DISAMBIGUATION_OPTION_LENGTH = 100;
