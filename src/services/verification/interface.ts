/**
 * What a verification source knows about a name in a given language.
 * `canonicalId` is the cross-language identifier entities are merged on.
 */
export interface PageLookup {
  exists: boolean;
  isDisambiguation: boolean;
  canonicalId: string | null;
  canonicalTitle: string;
  url: string | null;
  pageId: string | null;
  extract: string | null;
  disambiguationOptions: string[];
}

export interface VerificationSource {
  readonly name: string;
  /** Rejects when the source cannot be reached; a missing page resolves with `exists: false`. */
  lookup(name: string, language: string): Promise<PageLookup>;
}

export function missingPage(name: string): PageLookup {
  return {
    exists: false,
    isDisambiguation: false,
    canonicalId: null,
    canonicalTitle: name,
    url: null,
    pageId: null,
    extract: null,
    disambiguationOptions: [],
  };
}
