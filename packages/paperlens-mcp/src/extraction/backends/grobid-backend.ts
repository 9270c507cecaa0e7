import { load } from 'cheerio';
import { SourceAccessError } from '../../core/errors.js';
import type { HttpClient } from '../../core/http-client.js';
import { documentFileName, isPdfBytes, readDocumentBytes } from '../document-source.js';
import type { BackendOutput, DocumentHandle, ExtractionBackend } from '../types.js';

const collapse = (value: string): string => value.replace(/\s+/g, ' ').trim();

/**
 * Flattens a GROBID TEI document into paragraphs: title, abstract, then body
 * headings and paragraphs in document order. Bibliography entries are left out
 * so reference lists do not inflate citation counts.
 */
export const parseTeiDocument = (xml: string): string => {
  const $ = load(xml, { xml: true });

  const title = collapse($('teiHeader titleStmt > title').first().text());
  const abstract = $('teiHeader abstract p')
    .map((_, element) => collapse($(element).text()))
    .get();
  const body = $('text > body')
    .find('head, p')
    .map((_, element) => collapse($(element).text()))
    .get();

  return [title, ...abstract, ...body].filter((block) => block.length > 0).join('\n\n');
};

export class GrobidBackend implements ExtractionBackend {
  readonly name = 'grobid';

  constructor(
    private readonly baseUrl: string,
    private readonly httpClient: HttpClient
  ) {}

  async extract(handle: DocumentHandle): Promise<BackendOutput> {
    const bytes = await readDocumentBytes(handle);
    if (!isPdfBytes(bytes)) {
      throw new SourceAccessError(`${documentFileName(handle)} is not a PDF document.`);
    }

    const formData = new FormData();
    formData.set('input', new Blob([Buffer.from(bytes)], { type: 'application/pdf' }), documentFileName(handle));
    formData.set('consolidateHeader', '0');

    const xml = await this.httpClient.postForText({
      url: new URL('/api/processFulltextDocument', this.baseUrl),
      body: formData,
      accept: 'application/xml'
    });

    return { text: parseTeiDocument(xml) };
  }
}
