/**
 * XML to EDI model
 *
 * Reads the XML form of an EDI document:
 *
 *   <edi>
 *     <isa><isa01>00</isa01>...</isa>
 *     <stloop>
 *       <st><st01>850</st01><st02>0001</st02></st>
 *       <svc><svc01><svc0101>HC</svc0101><svc0102>99213</svc0102></svc01></svc>
 *       <dtm><dtm02 type="dt">2024-03-05</dtm02></dtm>
 *     </stloop>
 *   </edi>
 *
 * Elements whose name ends in "loop" are containers and are read recursively;
 * any other element is a segment named by its upper-cased tag. Inside a
 * segment, the last two characters of a child's tag give its 1-based field
 * position; children without a numeric suffix are skipped. Repeating a field
 * tag adds a repetition. A field with children of its own is a composite,
 * decomposed by the same suffix rule. Leaf text goes through
 * decodeTypedValue() with the leaf's `type` attribute.
 */

import { registerComponent } from '../../logging/DebugModeRegistry.js';
import { getLogger } from '../../logging/LoggerFactory.js';
import { EDIComponent } from '../../model/EDIComponent.js';
import { EDIElement } from '../../model/EDIElement.js';
import { EDIRepetition } from '../../model/EDIRepetition.js';
import { EDISegment } from '../../model/EDISegment.js';
import { growSlots } from '../../model/slots.js';
import { parseXmlTree, type XmlNode } from '../../util/XmlTree.js';
import { decodeTypedValue } from './EDIValue.js';

registerComponent('edi-xml', 'EDI XML bridge');
const logger = getLogger('edi-xml').child('reader');

/** Tag suffix marking a container of segments */
export const LOOP_SUFFIX = 'loop';

/**
 * 0-based slot index from a tag's two-digit suffix: "isa16" is 15.
 * Returns -1 when the tag is shorter than two characters or the suffix is
 * not a number.
 */
export function getElementIndex(elementName: string): number {
  if (elementName.length < 2) {
    return -1;
  }
  const suffix = elementName.substring(elementName.length - 2);
  if (!/^\d{2}$/.test(suffix)) {
    return -1;
  }
  return Number(suffix) - 1;
}

/**
 * Build EDI segments from an XML tree
 */
export class EDIXMLReader {
  /**
   * Segments found under the root, in document order.
   */
  read(root: XmlNode): EDISegment[] {
    const segments: EDISegment[] = [];
    this.loadLoop(root, segments);
    logger.debug(`Read ${segments.length} segments from <${root.name}>`);
    return segments;
  }

  /**
   * Parse XML text and read its root element.
   */
  readText(xml: string): EDISegment[] {
    return this.read(parseXmlTree(xml));
  }

  private loadLoop(loop: XmlNode, segments: EDISegment[]): void {
    for (const child of loop.children) {
      if (child.name.endsWith(LOOP_SUFFIX)) {
        this.loadLoop(child, segments);
      } else {
        segments.push(this.loadSegment(child));
      }
    }
  }

  private loadSegment(xml: XmlNode): EDISegment {
    const segment = new EDISegment(xml.name.toUpperCase());
    for (const field of xml.children) {
      const index = getElementIndex(field.name);
      if (index === -1) {
        logger.trace(`Skipping <${field.name}> in <${xml.name}>: no position suffix`);
        continue;
      }
      growSlots(segment.elements, index + 1);
      let element = segment.elements[index];
      if (!element) {
        element = new EDIElement();
        segment.elements[index] = element;
      }
      element.repetitions.push(this.loadRepetition(field));
    }
    return segment;
  }

  private loadRepetition(xml: XmlNode): EDIRepetition {
    if (xml.children.length === 0) {
      return new EDIRepetition(loadValue(xml));
    }

    const repetition = new EDIRepetition();
    for (const part of xml.children) {
      const index = getElementIndex(part.name);
      if (index === -1) {
        continue;
      }
      growSlots(repetition.components, index + 1);
      // A repeated component position keeps its first value.
      if (!repetition.components[index]) {
        repetition.components[index] = new EDIComponent(loadValue(part));
      }
    }
    return repetition;
  }
}

/**
 * Leaf text, encoded according to the node's `type` attribute.
 */
export function loadValue(xml: XmlNode): string {
  return decodeTypedValue(xml.text, xml.attributes['type']);
}

/**
 * Read segments from XML text (convenience function)
 */
export function readEDIFromXML(xml: string): EDISegment[] {
  return new EDIXMLReader().readText(xml);
}
