import matter from 'gray-matter';
import { z } from 'zod';
import type { Logger } from 'pino';
import { parseUtcTimestamp } from '../core/time.js';
import { FrontMatterError, errorMessage } from '../errors.js';

/** Metadata a note may carry. Every field is independently optional. */
export interface NoteMetadata {
  title?: string;
  tags: string[];
  created?: Date;
  modified?: Date;
}

export interface ParsedNote {
  metadata: NoteMetadata;
  body: string;
  /** Set when the header block existed but could not be read. */
  error?: FrontMatterError;
}

const HEADER_RE = /^---[ \t]*\r?\n(?:[\s\S]*?\r?\n)?---[ \t]*(?:\r?\n|$)/;

const title = z
  .union([z.string(), z.number()])
  .transform(value => String(value).trim())
  .transform(value => (value === '' ? undefined : value))
  .optional()
  .catch(undefined);

const tagValue = z.union([z.string(), z.number()]).transform(String);

const tags = z
  .union([
    z.array(tagValue.nullable()).transform(list => list.filter((t): t is string => t !== null)),
    z.string().transform(value => value.split(',')),
  ])
  .transform(list => list.map(t => t.trim()).filter(t => t.length > 0))
  .optional()
  .transform(list => list ?? [])
  .catch([]);

const timestamp = z
  .unknown()
  .transform(value => parseUtcTimestamp(value))
  .catch(undefined);

const metadataSchema = z.object({
  title,
  tags,
  created: timestamp,
  modified: timestamp,
});

function emptyMetadata(): NoteMetadata {
  return { tags: [] };
}

/**
 * Split a note into its front matter and body.
 *
 * No header block → empty metadata and the whole text as body. A block that
 * does not parse is logged as a warning and treated as empty; it is still cut
 * from the body so raw YAML never reaches the page.
 */
export function parseFrontMatter(raw: string, logger?: Logger, source?: string): ParsedNote {
  const text = raw.replace(/^\uFEFF/, '');
  if (!HEADER_RE.test(text)) {
    return { metadata: emptyMetadata(), body: text };
  }

  let data: unknown;
  let body: string;
  try {
    // An options object keeps gray-matter from caching the result per input string.
    const parsed = matter(text, {});
    data = parsed.data;
    body = parsed.content;
  } catch (error) {
    const failure = new FrontMatterError(`Malformed front matter: ${errorMessage(error)}`, {
      cause: error,
      context: source ? { source } : undefined,
    });
    logger?.warn({ source, err: failure.message }, 'Ignoring malformed front matter');
    return { metadata: emptyMetadata(), body: text.replace(HEADER_RE, ''), error: failure };
  }

  const result = metadataSchema.safeParse(data ?? {});
  if (!result.success) {
    const failure = new FrontMatterError('Front matter is not a key/value mapping', {
      context: source ? { source } : undefined,
    });
    logger?.warn({ source }, 'Ignoring front matter that is not a mapping');
    return { metadata: emptyMetadata(), body: stripLeadingNewlines(body), error: failure };
  }

  const { title: parsedTitle, tags: parsedTags, created, modified } = result.data;
  return {
    metadata: {
      title: parsedTitle,
      tags: parsedTags,
      created,
      modified,
    },
    body: stripLeadingNewlines(body),
  };
}

function stripLeadingNewlines(text: string): string {
  return text.replace(/^(?:[ \t]*\r?\n)+/, '');
}
