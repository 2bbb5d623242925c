export type PublicUrlResolver = (path: string) => string | null;

export interface StorageUrlOptions {
  baseUrl: string;
  bucket: string;
  now?: () => number;
}

export function encodeObjectPath(path: string): string {
  return encodeURIComponent(path)
    .replace(/[!'()*]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, '/');
}

/** Builds public object URLs with a `t` cache breaker in unix seconds. */
export function createPublicUrlResolver({ baseUrl, bucket, now = Date.now }: StorageUrlOptions): PublicUrlResolver {
  const root = baseUrl.replace(/\/+$/, '');
  return (path) => {
    if (!path) return null;
    const stamp = Math.floor(now() / 1000);
    return `${root}/${bucket}/${encodeObjectPath(path)}?t=${stamp}`;
  };
}
