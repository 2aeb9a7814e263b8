// The package root runs a debug self-test when it is not loaded through CommonJS `require`,
// so the library entry under lib/ is imported instead. @types/pdf-parse covers only the root
// and types `pagerender` as synchronous, while pdf.js page text is read asynchronously.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import PdfParse = require('pdf-parse');

  function pdfParse(dataBuffer: Buffer, options?: pdfParse.Options): Promise<PdfParse.Result>;

  namespace pdfParse {
    interface TextItem {
      str: string;
      transform: number[];
    }

    interface PageData {
      pageIndex: number;
      getTextContent(options?: {
        normalizeWhitespace?: boolean;
        disableCombineTextItems?: boolean;
      }): Promise<{ items: TextItem[] }>;
    }

    interface Options extends Omit<PdfParse.Options, 'pagerender'> {
      pagerender?: (pageData: PageData) => string | Promise<string>;
    }

    type Result = PdfParse.Result;
  }

  export = pdfParse;
}
