import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable, Writable } from 'stream';
import {
  loadEDIFile,
  loadEDIStream,
  loadXMLFile,
  loadXMLStream,
  readStreamText,
  saveEDIFile,
  saveXMLFile,
  writeEDIStream,
  writeStreamText,
} from '../../../src/io/EDIFileIO.js';
import { EDIDocument } from '../../../src/model/EDIDocument.js';
import { EDISegment } from '../../../src/model/EDISegment.js';
import { SAMPLE_SEGMENT_IDS, SAMPLE_X12 } from '../../helpers/x12.js';

class CollectingWritable extends Writable {
  text = '';

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString('utf8');
    callback();
  }
}

describe('EDIFileIO', () => {
  describe('streams', () => {
    it('should join chunks, including a character split across them', async () => {
      const bytes = Buffer.from('N1*ST*CAFÉ~', 'utf8');
      const split = bytes.indexOf(0xc3) + 1;
      const readable = Readable.from([bytes.subarray(0, split), bytes.subarray(split)]);
      expect(await readStreamText(readable)).toBe('N1*ST*CAFÉ~');
    });

    it('should accept string chunks', async () => {
      expect(await readStreamText(Readable.from(['ST*850', '*0001~']))).toBe('ST*850*0001~');
    });

    it('should parse EDI and XML from streams', async () => {
      const edi = await loadEDIStream(Readable.from([SAMPLE_X12.substring(0, 50), SAMPLE_X12.substring(50)]));
      expect(edi.segments.map((segment) => segment.id)).toEqual(SAMPLE_SEGMENT_IDS);

      const xml = await loadXMLStream(Readable.from(['<edi><st><st01>850</st01></st></edi>']));
      expect(xml.segments[0]?.get(1)).toBe('850');
    });

    it('should write serialized text to a stream', async () => {
      const writable = new CollectingWritable();
      const document = EDIDocument.create().addSegment(EDISegment.of('ST', '850', '0001'));

      await writeEDIStream(document, writable, { lineSeparator: '\n' });
      await writeStreamText(writable, 'SE*2*0001~');

      expect(writable.text).toBe('ST*850*0001~\nSE*2*0001~');
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'edi-io-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load and save EDI files', async () => {
      const input = join(dir, 'in.edi');
      const output = join(dir, 'out.edi');
      await writeFile(input, SAMPLE_X12, 'utf8');

      const document = await loadEDIFile(input);
      await saveEDIFile(document, output, { lineSeparator: '\n' });

      expect(await readFile(output, 'utf8')).toBe(SAMPLE_X12.replace(/~/g, '~\n'));
    });

    it('should pass delimiters through when loading', async () => {
      const input = join(dir, 'in.edi');
      await writeFile(input, 'ST|850\nSE|2\n', 'utf8');

      const document = await loadEDIFile(input, { segmentTerminator: '\n', elementSeparator: '|' });
      expect(document.segments.map((segment) => segment.get(1))).toEqual(['850', '2']);
    });

    it('should save and load XML files', async () => {
      const path = join(dir, 'doc.xml');
      await saveXMLFile(EDIDocument.parse(SAMPLE_X12), path, { pretty: true });

      const document = await loadXMLFile(path);
      expect(document.serialize()).toBe(SAMPLE_X12);
    });

    it('should reject when the file does not exist', async () => {
      await expect(loadEDIFile(join(dir, 'missing.edi'))).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });
});
