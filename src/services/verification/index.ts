import { WikipediaVerificationSource } from './wikipedia.provider';
import type { VerificationSource } from './interface';

export type { PageLookup, VerificationSource } from './interface';
export { missingPage } from './interface';
export { extractDisambiguationOptions } from './disambiguation';
export { WikipediaVerificationSource, toPageLookup } from './wikipedia.provider';

let defaultSource: VerificationSource | null = null;

export function getVerificationSource(): VerificationSource {
  if (!defaultSource) {
    defaultSource = new WikipediaVerificationSource();
  }
  return defaultSource;
}
