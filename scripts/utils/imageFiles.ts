import path from 'path';
import { IMAGE_INGEST } from '../../src/config/ingest/constants';

export interface ExtractedImageFile {
  fileName: string;
  pageIndex: number;
  imageIndex: number;
  ext: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return IMAGE_INGEST.allowedExtensions.includes(lower) ? lower : IMAGE_INGEST.fallbackExtension;
}

/** Matches `{pdf}_p{pageIndex}_i{imageIndex}.{ext}` names for one PDF, ordered by page then index. */
export function matchExtractedImages(pdfFile: string, fileNames: string[]): ExtractedImageFile[] {
  const pattern = new RegExp(`^${escapeRegExp(path.basename(pdfFile))}_p(\\d+)_i(\\d+)\\.(\\w+)$`);
  const matches: ExtractedImageFile[] = [];
  for (const fileName of fileNames) {
    const m = pattern.exec(fileName);
    if (!m) continue;
    matches.push({
      fileName,
      pageIndex: Number(m[1]),
      imageIndex: Number(m[2]),
      ext: m[3]
    });
  }
  return matches.sort((a, b) => a.pageIndex - b.pageIndex || a.imageIndex - b.imageIndex);
}

export function contentTypeFor(ext: string): string {
  const normalized = normalizeExtension(ext);
  return `image/${normalized === 'jpg' ? 'jpeg' : normalized}`;
}
