import { promises as fs } from 'node:fs';
import { basename, resolve } from 'node:path';
import type { DocumentHandle } from './types.js';

const PDF_MAGIC = '%PDF';

export const toAbsolutePath = (value: string): string => (value.startsWith('/') ? value : resolve(process.cwd(), value));

export const readDocumentBytes = async (handle: DocumentHandle): Promise<Uint8Array> => {
  if (handle.kind === 'buffer') {
    return handle.data;
  }

  return fs.readFile(toAbsolutePath(handle.path));
};

export const documentFileName = (handle: DocumentHandle): string =>
  handle.kind === 'buffer' ? handle.fileName : basename(handle.path);

export const isPdfBytes = (bytes: Uint8Array): boolean =>
  bytes.length >= PDF_MAGIC.length && Buffer.from(bytes.subarray(0, PDF_MAGIC.length)).toString('latin1') === PDF_MAGIC;
