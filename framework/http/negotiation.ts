/**
 * Content Negotiation
 *
 * Accept header parsing and media range matching.
 */

export interface MediaRange {
  type: string;
  subtype: string;
  quality: number;
}

/**
 * Parse an Accept header into media ranges.
 * Entries without a type/subtype pair are dropped.
 */
export function parseAccept(header: string): MediaRange[] {
  const ranges: MediaRange[] = [];

  for (const part of header.split(',')) {
    const [range, ...params] = part.split(';').map((s) => s.trim());
    const [type, subtype] = range.toLowerCase().split('/');
    if (!type || !subtype) continue;

    let quality = 1;
    for (const param of params) {
      const [key, value] = param.split('=').map((s) => s.trim());
      if (key.toLowerCase() !== 'q') continue;
      const q = Number.parseFloat(value);
      if (!Number.isNaN(q)) {
        quality = Math.min(Math.max(q, 0), 1);
      }
    }

    ranges.push({ type, subtype, quality });
  }

  return ranges;
}

/**
 * How specifically a range names a media type: 2 for an exact match,
 * 1 for `type/*`, 0 for `*\/*`, -1 when it does not match at all.
 */
function specificity(range: MediaRange, type: string, subtype: string): number {
  if (range.type === type && range.subtype === subtype) return 2;
  if (range.type === type && range.subtype === '*') return 1;
  if (range.type === '*' && range.subtype === '*') return 0;
  return -1;
}

/**
 * Whether an Accept header admits the given media type.
 *
 * The most specific matching range decides, and it must carry a
 * non-zero quality. A missing or blank header accepts everything.
 */
export function acceptsMediaType(header: string | null, mediaType: string): boolean {
  if (header === null || header.trim() === '') return true;

  const [type, subtype] = mediaType.toLowerCase().split('/');
  let best: MediaRange | null = null;
  let bestSpecificity = -1;

  for (const range of parseAccept(header)) {
    const score = specificity(range, type, subtype);
    if (score > bestSpecificity) {
      best = range;
      bestSpecificity = score;
    }
  }

  return best !== null && best.quality > 0;
}
