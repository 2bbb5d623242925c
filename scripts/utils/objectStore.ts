import { fetchWithRetry } from './retry';

export interface ObjectStoreOptions {
  uploadBaseUrl: string;
  bucket: string;
  accessToken: string;
}

export function uploadUrl({ uploadBaseUrl, bucket }: Omit<ObjectStoreOptions, 'accessToken'>, name: string): string {
  const root = uploadBaseUrl.replace(/\/+$/, '');
  return `${root}/b/${encodeURIComponent(bucket)}/o?uploadType=media&name=${encodeURIComponent(name)}`;
}

export async function uploadObject(
  options: ObjectStoreOptions,
  name: string,
  content: Buffer,
  contentType: string
): Promise<void> {
  await fetchWithRetry(uploadUrl(options, name), {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${options.accessToken}`,
      'Content-Type': contentType
    },
    body: new Uint8Array(content)
  });
}
