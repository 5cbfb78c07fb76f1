import type { EntityRequest, EntityResolution } from '../../types/chronicle';
import type { PageLookup, VerificationSource } from '../verification';

export interface EntityResolverDeps {
  verification?: VerificationSource;
}

/** A request whose page exists, is not a disambiguation and carries a canonical id. */
export interface VerifiedMatch {
  index: number;
  request: EntityRequest;
  page: PageLookup;
  canonicalId: string;
}

export function resolvedResult(entityId: string, message: string): EntityResolution {
  return { status: 'resolved', entityId, verified: true, message };
}

export function notFoundResult(message: string): EntityResolution {
  return { status: 'not_found', entityId: null, verified: false, message };
}

export function disambiguationResult(options: string[], message: string): EntityResolution {
  return { status: 'disambiguation', entityId: null, verified: false, options, message };
}

export function errorResult(message: string): EntityResolution {
  return { status: 'error', entityId: null, verified: false, message };
}
