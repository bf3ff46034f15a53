export interface DuplicateMatch {
  paperId: string;
  firstPath: string;
}

/**
 * First-come registry of paper IDs. The driver feeds it in ingestion order,
 * so the earliest document always keeps the primary ID.
 */
export class DuplicateIndex {
  private readonly seen = new Map<string, string>();

  /** Returns the earlier holder of the ID, or registers this document. */
  register(paperId: string, documentPath: string): DuplicateMatch | null {
    const firstPath = this.seen.get(paperId);
    if (firstPath !== undefined) {
      return { paperId, firstPath };
    }
    this.seen.set(paperId, documentPath);
    return null;
  }

  has(paperId: string): boolean {
    return this.seen.has(paperId);
  }

  get size(): number {
    return this.seen.size;
  }
}
