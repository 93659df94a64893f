export const STREAM_PATH = '/stream';

// The backend already sends Cache-Control: no-store; the changing `t` makes
// the browser drop the old multipart connection and open a new one.
export const withCacheBuster = (src: string, now: number = Date.now()): string => {
  const url = new URL(src, window.location.href);
  url.searchParams.set('t', String(now));
  return url.toString();
};
