/**
 * X12 EDI codec
 *
 * Text <-> model: EDIParser / EDISerializer
 * XML <-> model: EDIXMLReader / EDIXMLWriter
 */

export {
  EDIOptions,
  unescapeDelimiter,
  DEFAULT_ELEMENT_SEPARATOR,
  DEFAULT_SEGMENT_TERMINATOR,
  type EDIDelimiters,
  type DelimiterKey,
} from './EDIOptions.js';
export { getCodecConfig, resetCodecConfig, type CodecConfiguration } from './config.js';

export {
  inferElementSeparator,
  inferSegmentTerminator,
  resolveSeparators,
  ISA_SEGMENT_TERMINATOR_INDEX,
} from './SeparatorInference.js';

export {
  EDIParser,
  parseElement,
  parseRepetition,
  declaresRepetitionSeparator,
  ISA_COMPONENT_SEPARATOR_FIELD,
  ISA_REPETITION_SEPARATOR_FIELD,
  ISA_VERSION_FIELD,
  REPETITION_SEPARATOR_MIN_VERSION,
  type ParseResult,
} from './EDIParser.js';

export { EDISerializer, serializeEDI, type EDISerializeOptions } from './EDISerializer.js';

export { EDIValue, decodeTypedValue } from './EDIValue.js';

export { EDIXMLReader, getElementIndex, loadValue, readEDIFromXML, LOOP_SUFFIX } from './EDIXMLReader.js';
export {
  EDIXMLWriter,
  writeEDIToXML,
  DEFAULT_XML_ROOT,
  TRANSACTION_SET_LOOP,
  type EDIXMLWriteOptions,
} from './EDIXMLWriter.js';

export { extractEDIMetaData, type EDIMetaData } from './EDIMetaData.js';
