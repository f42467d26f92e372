export {
  loadEDIFile,
  loadEDIStream,
  saveEDIFile,
  writeEDIStream,
  loadXMLFile,
  loadXMLStream,
  saveXMLFile,
  readStreamText,
  writeStreamText,
} from './EDIFileIO.js';
