import { sha256, stableStringify } from '../utils/cache';
import { canonicalize } from '../utils/canonicalize';
import { firstAuthorSurname } from '../reconcile/fields';
import type { CanonicalMetadata } from '../pipeline/types';

export interface IdentityTuple {
  title: string;
  firstAuthor: string;
  year: number;
}

export interface StableIdentity {
  paperId: string;
  resolved: boolean;
  tuple?: IdentityTuple;
}

const ID_LENGTH = 16;

export function identityTuple(metadata: CanonicalMetadata): IdentityTuple | null {
  const title = canonicalize(metadata.title ?? '');
  const firstAuthor = firstAuthorSurname(metadata.authors);
  const year = metadata.year;
  if (!title || !firstAuthor || year === undefined) {
    return null;
  }
  return { title, firstAuthor, year };
}

export function fallbackId(contentHash: string): string {
  return `doc_${contentHash.slice(0, ID_LENGTH)}`;
}

/**
 * Paper ID from the normalized (title, first-author surname, year) tuple.
 * Documents without a full tuple get an ID from their content hash instead.
 */
export function assignStableId(metadata: CanonicalMetadata, contentHash: string): StableIdentity {
  const tuple = identityTuple(metadata);
  if (!tuple) {
    return { paperId: fallbackId(contentHash), resolved: false };
  }
  const digest = sha256(stableStringify(tuple));
  return { paperId: `paper_${digest.slice(0, ID_LENGTH)}`, resolved: true, tuple };
}
