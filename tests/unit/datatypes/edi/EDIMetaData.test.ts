import { describe, it, expect } from '@jest/globals';
import { EDIParser } from '../../../../src/datatypes/edi/EDIParser.js';
import { extractEDIMetaData } from '../../../../src/datatypes/edi/EDIMetaData.js';
import { EDISegment } from '../../../../src/model/EDISegment.js';
import { SAMPLE_X12 } from '../../../helpers/x12.js';

describe('extractEDIMetaData', () => {
  it('should read sender, type and version from a full interchange', () => {
    const { segments } = new EDIParser().parse(SAMPLE_X12);
    expect(extractEDIMetaData(segments)).toEqual({ source: 'SENDER', type: '837', version: '005010X222A1' });
  });

  it('should fall back to the GS application sender without an ISA', () => {
    const segments = [EDISegment.of('GS', 'PO', 'BUYERAPP'), EDISegment.of('ST', '850', '0001')];
    expect(extractEDIMetaData(segments)).toEqual({ source: 'BUYERAPP', type: '850' });
  });

  it('should skip blank values and use the first non-blank one', () => {
    const segments = [
      EDISegment.of('ISA', '00', '          ', '00', '          ', 'ZZ', '               '),
      EDISegment.of('GS', 'PO', 'BUYERAPP'),
      EDISegment.of('ST', '850', '0001'),
      EDISegment.of('ST', '997', '0002'),
    ];
    expect(extractEDIMetaData(segments)).toEqual({ source: 'BUYERAPP', type: '850' });
  });

  it('should return an empty object for an empty document', () => {
    expect(extractEDIMetaData([])).toEqual({});
  });
});
