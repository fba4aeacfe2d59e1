import { DEFAULT_IMAGE_BASE_URL } from '../config/app-config';

/**
 * Turn a stored poster reference into an absolute URL.
 *
 * Catalog rows and index metadata carry TMDb-style paths (`/abc.jpg`), paths
 * without the leading slash, full URLs from other hosts, or the literal `nan`
 * left behind by the ingestion of empty CSV cells.
 */
export function resolvePosterUrl(
  raw: string | null | undefined,
  imageBaseUrl: string = DEFAULT_IMAGE_BASE_URL,
): string | null {
  const ref = (raw ?? '').trim();
  if (!ref || ref.toLowerCase() === 'nan') return null;
  if (ref.startsWith('http')) return ref;

  const base = imageBaseUrl.endsWith('/') ? imageBaseUrl.slice(0, -1) : imageBaseUrl;
  if (ref.startsWith('/')) return `${base}${ref}`;
  return `${base}/${ref}`;
}

/** First non-empty reference wins; `nan` counts as empty. */
export function pickPosterReference(
  ...refs: Array<string | null | undefined>
): string | null {
  for (const ref of refs) {
    const t = (ref ?? '').trim();
    if (t && t.toLowerCase() !== 'nan') return t;
  }
  return null;
}
