const htmlEscapes: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => htmlEscapes[char] ?? char);

export const TELEGRAM_REPORT_MAX_LENGTH = 4000;
export const SEGMENT_SEPARATOR = '\n\n';

/**
 * Packs segments greedily into chunks of at most `maxLength` characters,
 * breaking only between segments. A segment longer than the limit is sent
 * as a chunk of its own, unsplit.
 */
export const chunkSegments = (
  segments: string[],
  maxLength = TELEGRAM_REPORT_MAX_LENGTH,
): string[] => {
  const chunks: string[] = [];
  let current = '';

  for (const segment of segments) {
    const candidate = current ? `${current}${SEGMENT_SEPARATOR}${segment}` : segment;
    if (candidate.length <= maxLength || !current) {
      current = candidate;
      continue;
    }
    chunks.push(current);
    current = segment;
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
};
