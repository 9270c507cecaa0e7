import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { describe, expect, it } from 'vitest';
import { HttpClient } from '../src/core/http-client.js';
import { Logger } from '../src/core/logger.js';
import { GrobidBackend, parseTeiDocument } from '../src/extraction/backends/grobid-backend.js';

const fixture = (name: string) => readFileSync(resolve(process.cwd(), 'test', 'fixtures', name), 'utf8');

const logger = new Logger('error', {}, () => {});

class RecordingHttpClient extends HttpClient {
  readonly requests: URL[] = [];

  constructor(private readonly responseBody: string) {
    super({ timeoutMs: 1000, retryAttempts: 0, retryDelayMs: 0 }, logger);
  }

  override async postForText({ url }: { url: URL; body: FormData; accept?: string }): Promise<string> {
    this.requests.push(url);
    return this.responseBody;
  }
}

const expectedText = [
  'Graph Models for Citation Analysis',
  'We study citation graphs across disciplines.',
  'Introduction',
  'Prior work (Smith, 2020) relied on surveys.',
  'Limitations',
  'The sample is small.'
].join('\n\n');

describe('parseTeiDocument', () => {
  it('flattens title, abstract and body in order and skips the bibliography', () => {
    expect(parseTeiDocument(fixture('grobid-fulltext.xml'))).toBe(expectedText);
  });

  it('returns an empty string for a TEI document without content', () => {
    expect(parseTeiDocument('<TEI><teiHeader/><text><body/></text></TEI>')).toBe('');
  });
});

describe('GrobidBackend', () => {
  it('posts PDFs to the fulltext endpoint and parses the response', async () => {
    const client = new RecordingHttpClient(fixture('grobid-fulltext.xml'));
    const backend = new GrobidBackend('http://grobid.test:8070', client);

    const { text } = await backend.extract({
      kind: 'buffer',
      data: new TextEncoder().encode('%PDF-1.7 fake body'),
      fileName: 'paper.pdf'
    });

    expect(text).toBe(expectedText);
    expect(client.requests.map((url) => url.toString())).toEqual(['http://grobid.test:8070/api/processFulltextDocument']);
  });

  it('rejects documents that are not PDFs without calling the service', async () => {
    const client = new RecordingHttpClient('');
    const backend = new GrobidBackend('http://grobid.test:8070', client);

    await expect(
      backend.extract({ kind: 'buffer', data: new TextEncoder().encode('plain text'), fileName: 'notes.txt' })
    ).rejects.toThrow('notes.txt is not a PDF document.');
    expect(client.requests).toHaveLength(0);
  });
});
