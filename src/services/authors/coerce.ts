/**
 * Author payload coercion
 *
 * The vision model's reply is untrusted: it may be wrapped in markdown
 * fences, preceded by reasoning text, carry numbers where strings belong or
 * omit fields. Everything is coerced to AuthorRecord here, at the boundary.
 *
 * @module services/authors/coerce
 */

import { z } from 'zod';
import type { AuthorRecord } from '../../models/author.js';

const scalarText = z.union([z.string(), z.number()]);

const optionalText = scalarText
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value).trim()));

export const RawAuthorSchema = z.object({
  name: scalarText.transform((value) => String(value).trim()),
  title: optionalText,
  email: optionalText,
});

const AuthorEnvelopeSchema = z.union([
  z.object({ authors: z.array(z.unknown()) }),
  z.array(z.unknown()).transform((authors) => ({ authors })),
]);

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Parse model text as JSON: as-is, without code fences, then the outermost
 * {...} block. Returns undefined when none of these parse.
 */
export function parseJsonText(text: string): unknown {
  if (!text || text.trim().length === 0) return undefined;

  const clean = text.replace(/```json\n?|\n?```/g, '').trim();
  const whole = tryParse(clean);
  if (whole.ok) return whole.value;

  const firstBrace = clean.indexOf('{');
  const lastBrace = clean.lastIndexOf('}');
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    const block = tryParse(clean.slice(firstBrace, lastBrace + 1));
    if (block.ok) return block.value;
  }
  return undefined;
}

/**
 * Coerce a list of raw entries. Entries that cannot be coerced are logged
 * and skipped; one bad entry never discards the rest.
 */
export function coerceAuthorRecords(entries: readonly unknown[], label = 'payload'): AuthorRecord[] {
  const records: AuthorRecord[] = [];
  entries.forEach((entry, index) => {
    const result = RawAuthorSchema.safeParse(entry);
    if (result.success) {
      records.push(result.data);
    } else {
      const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
      console.error(`[AuthorPayload] Skipping malformed author #${index} in ${label}: ${issues.join('; ')}`);
    }
  });
  return records;
}

/**
 * Extract author records from the model's response text.
 * Unparseable text or a reply without an `authors` list yields [].
 */
export function parseAuthorPayload(text: string, label = 'payload'): AuthorRecord[] {
  const parsed = parseJsonText(text);
  if (parsed === undefined) {
    console.error(
      `[AuthorPayload] Could not parse JSON from ${label} (length=${text.length}): ${text.slice(0, 200)}`
    );
    return [];
  }

  const envelope = AuthorEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    console.error(`[AuthorPayload] ${label} has no "authors" list`);
    return [];
  }
  return coerceAuthorRecords(envelope.data.authors, label);
}
