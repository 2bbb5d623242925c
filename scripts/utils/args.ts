import { z } from 'zod';

const ingestPdfArgsSchema = z.object({
  file: z.string().min(1, 'PDF file path is required'),
  extractImages: z.boolean().default(false),
  imagesDir: z.string().min(1).optional()
});

export type IngestPdfArgs = z.infer<typeof ingestPdfArgsSchema>;

/** `<file> [--extract-images] [--images-dir <dir>]` */
export function parseIngestPdfArgs(argv: string[]): IngestPdfArgs {
  const raw: { file?: string; extractImages: boolean; imagesDir?: string } = { extractImages: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--extract-images') {
      raw.extractImages = true;
    } else if (arg === '--images-dir') {
      raw.imagesDir = argv[i + 1];
      i += 1;
    } else if (arg.startsWith('--images-dir=')) {
      raw.imagesDir = arg.slice('--images-dir='.length);
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (raw.file === undefined) {
      raw.file = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }
  return ingestPdfArgsSchema.parse(raw);
}
