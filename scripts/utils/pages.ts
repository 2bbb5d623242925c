export interface PageText {
  page: number;
  content: string;
}

/**
 * pdf-parse prefixes every rendered page with a blank line. When the number of
 * segments matches the page count each segment becomes a page; otherwise the
 * whole text is kept as page 1.
 */
export function splitPages(text: string, numPages: number): { pages: PageText[]; pagesSplit: boolean } {
  const segments = text.replace(/^\n\n/, '').split('\n\n');
  if (numPages > 0 && segments.length === numPages) {
    return { pages: segments.map((content, idx) => ({ page: idx + 1, content })), pagesSplit: true };
  }
  const whole = text.trim();
  return { pages: whole ? [{ page: 1, content: whole }] : [], pagesSplit: false };
}
