import { foldDiacritics } from './text.js';

const SEPARATOR = '_';

/**
 * Turn a title into a page-safe slug: lowercase, diacritics folded, every run
 * of non letter/digit characters collapsed to `_`.
 */
export function slugify(text: string): string {
  const slug = foldDiacritics(text)
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, SEPARATOR)
    .replace(/^[_-]+|[_-]+$/g, '');
  return slug || 'untitled';
}

export interface ExistingPage {
  /** Source key of the note that owns this slug, when recorded. */
  owner?: string;
}

export interface SlugAllocatorOptions {
  /** Slugs present in the output directory, with their recorded owners. */
  existing: Map<string, ExistingPage>;
  /** Title heading of an existing page, read lazily for unowned slugs. */
  readTitle?: (slug: string) => string | undefined;
}

/**
 * Hands out unique slugs within one output directory.
 *
 * Candidates are tried in order `base`, `base-2`, `base-3`, … and the first
 * one that is free, already owned by the same source, or an unowned page with
 * the same title is claimed. Claims persist for the lifetime of the allocator,
 * so two notes with one title in the same run never share a slug.
 */
export class SlugAllocator {
  private readonly pages: Map<string, ExistingPage>;
  private readonly readTitle: (slug: string) => string | undefined;

  constructor(options: SlugAllocatorOptions) {
    this.pages = new Map(options.existing);
    this.readTitle = options.readTitle ?? (() => undefined);
  }

  allocate(title: string, sourceKey: string): string {
    const base = slugify(title);
    for (let n = 1; ; n++) {
      const candidate = n === 1 ? base : `${base}-${n}`;
      if (this.canClaim(candidate, title, sourceKey)) {
        this.pages.set(candidate, { owner: sourceKey });
        return candidate;
      }
    }
  }

  /** The source that currently owns a slug, if any. */
  ownerOf(slug: string): string | undefined {
    return this.pages.get(slug)?.owner;
  }

  private canClaim(candidate: string, title: string, sourceKey: string): boolean {
    const page = this.pages.get(candidate);
    if (!page) return true;
    if (page.owner !== undefined) return page.owner === sourceKey;
    // Page on disk without a recorded owner (ledger lost or pre-existing):
    // adopt it only when it carries this note's title.
    return this.readTitle(candidate) === title.trim();
  }
}
