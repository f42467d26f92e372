/**
 * EDI model to XML
 *
 * The inverse of EDIXMLReader. Segment tags are the lower-cased identifier,
 * field tags append the two-digit position ("n104"), component tags append
 * another two digits ("svc0102"). Absent slots are left out; each repetition
 * of a field is written as another element with the same tag. A composite
 * with a single component is written as a plain value.
 *
 * A composite with no present component ("::") is written as an empty field
 * element and reads back as an empty scalar, so its separators are not
 * reproduced when the XML is turned back into text.
 */

import { registerComponent } from '../../logging/DebugModeRegistry.js';
import { getLogger } from '../../logging/LoggerFactory.js';
import type { EDIRepetition } from '../../model/EDIRepetition.js';
import type { EDISegment } from '../../model/EDISegment.js';
import { deriveTransactionSets } from '../../model/EDITransactionSet.js';
import { buildXmlTree, createXmlNode, type XmlBuildOptions, type XmlNode } from '../../util/XmlTree.js';
import { LOOP_SUFFIX } from './EDIXMLReader.js';

registerComponent('edi-xml', 'EDI XML bridge');
const logger = getLogger('edi-xml').child('writer');

export const DEFAULT_XML_ROOT = 'edi';
/** Container written around each ST..SE run when grouping is on */
export const TRANSACTION_SET_LOOP = `st${LOOP_SUFFIX}`;

export interface EDIXMLWriteOptions extends XmlBuildOptions {
  /** Root element name (default "edi") */
  rootName?: string;
  /** Wrap each transaction set in an <stloop> element (default false) */
  groupTransactionSets?: boolean;
}

function positionSuffix(position: number): string {
  return String(position).padStart(2, '0');
}

/**
 * Build an XML tree from EDI segments
 */
export class EDIXMLWriter {
  private readonly rootName: string;
  private readonly groupTransactionSets: boolean;

  constructor(private readonly options: EDIXMLWriteOptions = {}) {
    this.rootName = options.rootName ?? DEFAULT_XML_ROOT;
    this.groupTransactionSets = options.groupTransactionSets ?? false;
  }

  write(segments: readonly EDISegment[]): XmlNode {
    const root = createXmlNode(this.rootName);
    if (!this.groupTransactionSets) {
      root.children.push(...segments.map((segment) => this.writeSegment(segment)));
      return root;
    }

    const setsByFirstSegment = new Map(
      deriveTransactionSets(segments).map((set) => [set.segments[0], set] as const)
    );
    for (let i = 0; i < segments.length; i++) {
      const segment = segments[i];
      if (!segment) continue;
      const transactionSet = setsByFirstSegment.get(segment);
      if (!transactionSet) {
        root.children.push(this.writeSegment(segment));
        continue;
      }
      root.children.push(
        createXmlNode(TRANSACTION_SET_LOOP, {
          children: transactionSet.segments.map((member) => this.writeSegment(member)),
        })
      );
      i += transactionSet.segments.length - 1;
    }
    return root;
  }

  /**
   * Render the tree as XML text with the configured formatting.
   */
  writeText(segments: readonly EDISegment[]): string {
    return buildXmlTree(this.write(segments), this.options);
  }

  private writeSegment(segment: EDISegment): XmlNode {
    const tag = segment.id.toLowerCase();
    const node = createXmlNode(tag);
    segment.elements.forEach((element, index) => {
      if (!element) return;
      if (index >= 99) {
        logger.warn(`Field ${index + 1} of ${segment.id} cannot be named with a two-digit suffix; skipped`);
        return;
      }
      const fieldTag = tag + positionSuffix(index + 1);
      for (const repetition of element.repetitions) {
        node.children.push(this.writeRepetition(fieldTag, repetition));
      }
    });
    return node;
  }

  private writeRepetition(fieldTag: string, repetition: EDIRepetition): XmlNode {
    const components = repetition.components;
    if (components.length === 0) {
      return createXmlNode(fieldTag, { text: repetition.value ?? '' });
    }
    if (components.length === 1) {
      return createXmlNode(fieldTag, { text: components[0]?.value ?? '' });
    }
    const node = createXmlNode(fieldTag);
    components.forEach((component, index) => {
      if (component && index < 99) {
        node.children.push(createXmlNode(fieldTag + positionSuffix(index + 1), { text: component.value }));
      }
    });
    return node;
  }
}

/**
 * Segments to XML text (convenience function)
 */
export function writeEDIToXML(segments: readonly EDISegment[], options?: EDIXMLWriteOptions): string {
  return new EDIXMLWriter(options).writeText(segments);
}
