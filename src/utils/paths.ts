// Characters rejected by at least one of the filesystems we write to
const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;

export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(ILLEGAL_FILENAME_CHARS, '_').trim();
  if (cleaned === '' || cleaned === '.' || cleaned === '..') {
    return '';
  }
  return cleaned;
}

/**
 * Last path segment of the URL, percent-decoded and made safe for the filesystem.
 * Empty string when the URL has no usable segment.
 */
export function fileNameFromUrl(url: URL): string {
  const segments = url.pathname.split('/').filter((segment) => segment.length > 0);
  const last = segments.at(-1);
  if (!last) {
    return '';
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(last);
  } catch {
    decoded = last;
  }
  return sanitizeFileName(decoded);
}

export function fallbackFileName(now: number = Date.now()): string {
  return `download_${now}`;
}
