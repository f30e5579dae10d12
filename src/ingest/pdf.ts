import pdfParse from 'pdf-parse/lib/pdf-parse.js';

export type PdfPageExtractor = (bytes: Buffer) => Promise<string[]>;

/**
 * Same layout rule as pdf-parse's default renderer: items on one baseline
 * are concatenated, a change of baseline starts a new line.
 */
async function renderPage(page: pdfParse.PageData): Promise<string> {
  const content = await page.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false });
  let lastY: number | undefined;
  let text = '';
  for (const item of content.items) {
    const y = item.transform[5];
    if (lastY === undefined || lastY === y) {
      text += item.str;
    } else {
      text += `\n${item.str}`;
    }
    lastY = y;
  }
  return text;
}

/**
 * Extract text per page, in page order, using pdf-parse.
 */
export const extractPdfPages: PdfPageExtractor = async (bytes) => {
  // pdf-parse awaits each page's render before moving on and destroys the
  // document after the last one, so every page is read inside the call
  const pages: string[] = [];
  // pdf-parse turns a failed page into empty text; keep the failure instead
  const failures: unknown[] = [];
  await pdfParse(bytes, {
    pagerender: async (page) => {
      try {
        const text = await renderPage(page);
        pages.push(text);
        return text;
      } catch (err) {
        failures.push(err);
        throw err;
      }
    },
  });
  if (failures.length > 0) {
    throw failures[0];
  }
  return pages;
};
