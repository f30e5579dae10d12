// The package entry point runs a self-test when loaded without a parent
// module; the library itself lives at this subpath. Result and Version come
// from the package typings; the page renderer is typed as the library calls
// it, awaiting whatever it returns.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import PdfParse = require('pdf-parse');

  namespace pdfParse {
    interface TextItem {
      str: string;
      transform: number[];
    }

    interface PageData {
      getTextContent(opts?: { normalizeWhitespace?: boolean; disableCombineTextItems?: boolean }): Promise<{
        items: TextItem[];
      }>;
    }

    interface Options {
      pagerender?: (pageData: PageData) => string | Promise<string>;
      max?: number;
      version?: PdfParse.Version;
    }
  }

  function pdfParse(dataBuffer: Buffer, options?: pdfParse.Options): Promise<PdfParse.Result>;
  export = pdfParse;
}
