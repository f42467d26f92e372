/**
 * edi-codec
 *
 * ANSI X12 EDI codec: delimited text and XML to and from one document model.
 *
 *   import { EDIDocument } from 'edi-codec';
 *
 *   const document = EDIDocument.parse(text);
 *   const xml = document.toXmlString({ pretty: true });
 *   const edi = EDIDocument.parseXml(xml).serialize({ lineSeparator: '\n' });
 */

export * from './model/index.js';
export * from './datatypes/edi/index.js';
export * from './io/index.js';
export * from './errors/index.js';
export { createXmlNode, parseXmlTree, buildXmlTree, type XmlNode, type XmlBuildOptions } from './util/XmlTree.js';
export {
  LogLevel,
  getLogger,
  initializeLogging,
  setGlobalLevel,
  getGlobalLevel,
  setComponentLevel,
  clearComponentLevel,
  getRegisteredComponents,
  shutdownLogging,
} from './logging/index.js';
