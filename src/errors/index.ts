export { FormatError, isFormatError, type FormatErrorCode } from './FormatError.js';
