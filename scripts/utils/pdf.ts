import pdfParse from 'pdf-parse';
import { type PageText, splitPages } from './pages';

export interface PdfText {
  pages: PageText[];
  numPages: number;
  pagesSplit: boolean;
}

export async function extractPdfText(data: Buffer): Promise<PdfText> {
  const parsed = await pdfParse(data);
  const { pages, pagesSplit } = splitPages(parsed.text ?? '', parsed.numpages);
  return { pages, numPages: parsed.numpages, pagesSplit };
}
