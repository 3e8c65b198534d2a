/**
 * Encoding Options
 *
 * Validates the capability document printed by `yt-dlp --dump-json` and
 * derives the short list of choices offered to the requester.
 */

import { z } from 'zod';

export const BEST_ENCODING = 'best';
export const MAX_ENCODING_OPTIONS = 6;

const rawFormatSchema = z.object({
  format_id: z.coerce.string(),
  ext: z.string().nullish(),
  height: z.number().nullish(),
  tbr: z.number().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish(),
  vcodec: z.string().nullish(),
  format: z.string().nullish(),
  format_note: z.string().nullish(),
});

const capabilityDocumentSchema = z.object({
  id: z.coerce.string().nullish(),
  title: z.string().nullish(),
  duration: z.number().nullish(),
  thumbnail: z.string().nullish(),
  formats: z.array(rawFormatSchema),
});

export type RawFormat = z.infer<typeof rawFormatSchema>;

export interface CapabilityDocument {
  id: string | null;
  title: string;
  durationSeconds: number | null;
  thumbnailUrl: string | null;
  formats: RawFormat[];
}

export interface EncodingOption {
  id: string;
  label: string;
  ext: string;
  /** Declared size in bytes, 0 when unknown */
  sizeBytes: number;
}

/**
 * Validate a parsed capability document. Returns null when it has no format list.
 */
export function parseCapabilityDocument(data: unknown): CapabilityDocument | null {
  const result = capabilityDocumentSchema.safeParse(data);
  if (!result.success) {
    return null;
  }

  const doc = result.data;
  return {
    id: doc.id ?? null,
    title: doc.title ?? 'Unknown',
    durationSeconds: doc.duration ?? null,
    thumbnailUrl: doc.thumbnail ?? null,
    formats: doc.formats,
  };
}

function isAudioOnly(format: RawFormat): boolean {
  return format.vcodec === 'none' || (format.format ?? '').toLowerCase().includes('audio only');
}

/**
 * Derive the selectable encodings: highest resolution first (then bitrate),
 * unique ids, no audio-only entries, capped, followed by the "best" choice.
 */
export function extractEncodingOptions(
  doc: CapabilityDocument,
  limit: number = MAX_ENCODING_OPTIONS
): EncodingOption[] {
  const sorted = [...doc.formats].sort(
    (a, b) => (b.height ?? 0) - (a.height ?? 0) || (b.tbr ?? 0) - (a.tbr ?? 0)
  );

  const seen = new Set<string>();
  const options: EncodingOption[] = [];

  for (const format of sorted) {
    if (options.length >= limit) break;
    if (seen.has(format.format_id) || isAudioOnly(format)) continue;

    const note = format.format_note ?? 'Unknown';
    options.push({
      id: format.format_id,
      label: format.height ? `${format.height}p ${note}` : note,
      ext: format.ext ?? 'mp4',
      sizeBytes: format.filesize ?? format.filesize_approx ?? 0,
    });
    seen.add(format.format_id);
  }

  options.push({ id: BEST_ENCODING, label: 'Best Quality', ext: '', sizeBytes: 0 });
  return options;
}
