import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, expect, test } from 'vitest';
import { PdfDocumentLoader } from '../src/ingest/loader';
import { extractPdfPages } from '../src/ingest/pdf';

const THREE_PAGES = readFileSync(join(__dirname, 'fixtures', 'three-pages.pdf'));

describe('extractPdfPages', () => {
  test('returns the text of every page in order, including the last', async () => {
    expect(await extractPdfPages(THREE_PAGES)).toEqual([
      'Everyday Account fees',
      'Home loan rates\nFixed and variable options',
      'Contact the branch for help',
    ]);
  });

  test('rejects bytes that are not a PDF', async () => {
    await expect(extractPdfPages(Buffer.from('not a pdf at all'))).rejects.toThrow();
  });
});

describe('PdfDocumentLoader with pdf-parse', () => {
  test('yields a document for the final page', async () => {
    const docs = await new PdfDocumentLoader().load({ storedFilename: 'rates.pdf', mediaType: 'pdf', bytes: THREE_PAGES });

    expect(docs.map((d) => [d.documentId, d.pageNumber])).toEqual([
      ['rates.pdf#p0', 0],
      ['rates.pdf#p1', 1],
      ['rates.pdf#p2', 2],
    ]);
    expect(docs[2].rawText).toBe('Contact the branch for help');
  });
});
