import { describe, it, expect } from '@jest/globals';
import { EDISegment } from '../../../src/model/EDISegment.js';
import { deriveTransactionSets } from '../../../src/model/EDITransactionSet.js';

function ids(segments: readonly EDISegment[]): string[] {
  return segments.map((segment) => segment.id);
}

describe('deriveTransactionSets', () => {
  const isa = EDISegment.of('ISA', '00');
  const gs = EDISegment.of('GS', 'PO', 'SENDERAPP');

  it('should tag each set with the open interchange and group headers', () => {
    const sets = deriveTransactionSets([
      isa,
      gs,
      EDISegment.of('ST', '850', '0001'),
      EDISegment.of('BEG', '00'),
      EDISegment.of('SE', '3', '0001'),
      EDISegment.of('ST', '850', '0002'),
      EDISegment.of('SE', '2', '0002'),
      EDISegment.of('GE', '2', '1'),
      EDISegment.of('IEA', '1', '000000001'),
    ]);

    expect(sets).toHaveLength(2);
    expect(sets.map((set) => set.controlNumber)).toEqual(['0001', '0002']);
    expect(ids(sets[0]?.segments ?? [])).toEqual(['ST', 'BEG', 'SE']);
    expect(sets[0]?.interchangeHeader).toBe(isa);
    expect(sets[1]?.interchangeHeader).toBe(isa);
    expect(sets[1]?.groupHeader).toBe(gs);
    expect(sets[0]?.transactionSetId).toBe('850');
  });

  it('should clear the group after GE and the interchange after IEA', () => {
    const sets = deriveTransactionSets([
      isa,
      gs,
      EDISegment.of('GE', '0', '1'),
      EDISegment.of('ST', '997', '0001'),
      EDISegment.of('SE', '2', '0001'),
      EDISegment.of('IEA', '1', '000000001'),
      EDISegment.of('ST', '997', '0002'),
      EDISegment.of('SE', '2', '0002'),
    ]);

    expect(sets[0]?.interchangeHeader).toBe(isa);
    expect(sets[0]?.groupHeader).toBeNull();
    expect(sets[1]?.interchangeHeader).toBeNull();
    expect(sets[1]?.groupHeader).toBeNull();
  });

  it('should keep collecting after an ST without an SE until the next ST', () => {
    const sets = deriveTransactionSets([
      EDISegment.of('ST', '850', '0001'),
      EDISegment.of('BEG', '00'),
      EDISegment.of('GE', '1', '1'),
      EDISegment.of('ST', '850', '0002'),
      EDISegment.of('SE', '2', '0002'),
    ]);

    expect(ids(sets[0]?.segments ?? [])).toEqual(['ST', 'BEG', 'GE']);
    expect(ids(sets[1]?.segments ?? [])).toEqual(['ST', 'SE']);
  });

  it('should ignore segments outside any set', () => {
    expect(deriveTransactionSets([isa, gs, EDISegment.of('GE', '0', '1')])).toEqual([]);
  });

  it('should match identifiers case-insensitively', () => {
    const sets = deriveTransactionSets([EDISegment.of('st', '810', '0001'), EDISegment.of('se', '2', '0001')]);
    expect(sets).toHaveLength(1);
    expect(sets[0]?.segments).toHaveLength(2);
  });
});
