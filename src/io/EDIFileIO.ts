/**
 * File and stream wrappers
 *
 * The codec works on whole strings; these helpers read a complete file or
 * stream as UTF-8 before parsing and write the fully rendered text in one go.
 */

import { readFile, writeFile } from 'fs/promises';
import type { Readable, Writable } from 'stream';
import type { EDIDelimiters } from '../datatypes/edi/EDIOptions.js';
import type { EDISerializeOptions } from '../datatypes/edi/EDISerializer.js';
import type { EDIXMLWriteOptions } from '../datatypes/edi/EDIXMLWriter.js';
import { registerComponent } from '../logging/DebugModeRegistry.js';
import { getLogger } from '../logging/LoggerFactory.js';
import { EDIDocument } from '../model/EDIDocument.js';

registerComponent('edi-io', 'EDI file and stream I/O');
const logger = getLogger('edi-io');

/**
 * Read a readable stream to the end as UTF-8 text.
 */
export async function readStreamText(readable: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of readable) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Write text to a writable stream and wait until it has been flushed.
 * The stream is left open.
 */
export function writeStreamText(writable: Writable, text: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    writable.write(text, 'utf8', (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

export async function loadEDIFile(path: string, options?: EDIDelimiters | null): Promise<EDIDocument> {
  const edi = await readFile(path, 'utf8');
  logger.debug(`Loaded ${edi.length} characters from ${path}`);
  return EDIDocument.parse(edi, options);
}

export async function loadEDIStream(readable: Readable, options?: EDIDelimiters | null): Promise<EDIDocument> {
  return EDIDocument.parse(await readStreamText(readable), options);
}

export async function saveEDIFile(
  document: EDIDocument,
  path: string,
  serializeOptions?: EDISerializeOptions
): Promise<void> {
  await writeFile(path, document.serialize(serializeOptions), 'utf8');
  logger.debug(`Saved ${document.segments.length} segments to ${path}`);
}

export async function writeEDIStream(
  document: EDIDocument,
  writable: Writable,
  serializeOptions?: EDISerializeOptions
): Promise<void> {
  await writeStreamText(writable, document.serialize(serializeOptions));
}

export async function loadXMLFile(path: string): Promise<EDIDocument> {
  return EDIDocument.parseXml(await readFile(path, 'utf8'));
}

export async function loadXMLStream(readable: Readable): Promise<EDIDocument> {
  return EDIDocument.parseXml(await readStreamText(readable));
}

export async function saveXMLFile(document: EDIDocument, path: string, options?: EDIXMLWriteOptions): Promise<void> {
  await writeFile(path, document.toXmlString(options), 'utf8');
  logger.debug(`Saved XML for ${document.segments.length} segments to ${path}`);
}
