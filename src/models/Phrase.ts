import { z } from 'zod';

export const MARKUP_KINDS = ['plaintext', 'ssml'] as const;

export type MarkupKind = (typeof MARKUP_KINDS)[number];

// Segments map to directories on a FAT-formatted SD card
export const PHRASE_ID_PATTERN = /^[A-Za-z0-9_-]+(\/[A-Za-z0-9_-]+)*$/;

export const PhraseSchema = z.object({
  id: z.string().regex(PHRASE_ID_PATTERN, 'phrase id must be path segments of letters, digits, _ or -'),
  text: z.string().refine((t) => t.trim().length > 0, 'phrase text must not be empty'),
  markup: z.enum(MARKUP_KINDS).default('plaintext')
});

export type Phrase = z.infer<typeof PhraseSchema>;

/**
 * Drops markup tags, for logging and for providers that need bare text
 */
export function stripMarkup(text: string): string {
  return text.replace(/<[^>]*>/g, '').replace(/\s+/g, ' ').trim();
}
