/**
 * An EDI document: an ordered list of segments plus the delimiters used to
 * write it back out.
 *
 * Documents come from named factories, one per source:
 * - EDIDocument.create()    empty, for building in code
 * - EDIDocument.parse()     delimited EDI text
 * - EDIDocument.fromXml()   an XML element tree
 * - EDIDocument.parseXml()  XML text
 */

import { EDIOptions, type EDIDelimiters } from '../datatypes/edi/EDIOptions.js';
import { EDIParser } from '../datatypes/edi/EDIParser.js';
import { EDISerializer, type EDISerializeOptions } from '../datatypes/edi/EDISerializer.js';
import { EDIXMLReader } from '../datatypes/edi/EDIXMLReader.js';
import { EDIXMLWriter, type EDIXMLWriteOptions } from '../datatypes/edi/EDIXMLWriter.js';
import { parseXmlTree, type XmlNode } from '../util/XmlTree.js';
import type { EDISegment } from './EDISegment.js';
import { deriveTransactionSets, type EDITransactionSet } from './EDITransactionSet.js';

export class EDIDocument {
  readonly segments: EDISegment[];
  private _options: EDIOptions;

  private constructor(options: EDIOptions, segments: EDISegment[] = []) {
    this._options = options;
    this.segments = segments;
  }

  /**
   * Empty document. `options` become the serialization defaults.
   */
  static create(options?: EDIDelimiters | null): EDIDocument {
    return new EDIDocument(EDIOptions.from(options));
  }

  /**
   * Tokenize EDI text. Delimiters missing from `options` are inferred, and
   * those declared by an ISA header override the configured ones. The
   * document keeps the delimiters that were in effect at the end of the text.
   */
  static parse(edi: string, options?: EDIDelimiters | null): EDIDocument {
    const result = new EDIParser(options).parse(edi);
    return new EDIDocument(result.options, result.segments);
  }

  /**
   * Read an XML element tree (see EDIXMLReader for the expected shape).
   */
  static fromXml(root: XmlNode, options?: EDIDelimiters | null): EDIDocument {
    return new EDIDocument(EDIOptions.from(options), new EDIXMLReader().read(root));
  }

  static parseXml(xml: string, options?: EDIDelimiters | null): EDIDocument {
    return EDIDocument.fromXml(parseXmlTree(xml), options);
  }

  /**
   * Delimiters used when serializing. ISA headers in the document still
   * override the component and repetition separators.
   */
  get options(): EDIOptions {
    return this._options;
  }

  set options(options: EDIDelimiters) {
    this._options = EDIOptions.from(options);
  }

  /**
   * Transaction sets, recomputed from the current segments on every access.
   */
  get transactionSets(): EDITransactionSet[] {
    return deriveTransactionSets(this.segments);
  }

  addSegment(...segments: EDISegment[]): this {
    this.segments.push(...segments);
    return this;
  }

  /**
   * Remove a segment by identity. Returns false when it is not in the document.
   */
  removeSegment(segment: EDISegment): boolean {
    const index = this.segments.indexOf(segment);
    if (index === -1) {
      return false;
    }
    this.segments.splice(index, 1);
    return true;
  }

  /**
   * Segments with the given identifier (case-insensitive), in order.
   */
  findSegments(id: string): EDISegment[] {
    return this.segments.filter((segment) => segment.is(id));
  }

  /**
   * EDI text. `overrides` replace delimiters of the document's options for
   * this call only.
   */
  serialize(serializeOptions?: EDISerializeOptions, overrides?: EDIDelimiters): string {
    const options = overrides ? this._options.withOverrides(overrides) : this._options;
    return new EDISerializer(options, serializeOptions).serialize(this.segments);
  }

  toXml(options?: EDIXMLWriteOptions): XmlNode {
    return new EDIXMLWriter(options).write(this.segments);
  }

  toXmlString(options?: EDIXMLWriteOptions): string {
    return new EDIXMLWriter(options).writeText(this.segments);
  }

  toString(): string {
    return this.serialize();
  }
}
