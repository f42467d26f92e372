import type { EDISegment } from './EDISegment.js';

/**
 * The segments from an ST through its SE, with the interchange (ISA) and
 * functional group (GS) headers that were open when the ST appeared.
 * A view over the document's segments; it owns nothing.
 */
export class EDITransactionSet {
  readonly segments: EDISegment[] = [];

  constructor(
    readonly interchangeHeader: EDISegment | null,
    readonly groupHeader: EDISegment | null
  ) {}

  /** ST01, e.g. "850" */
  get transactionSetId(): string | undefined {
    return this.segments[0]?.get(1);
  }

  /** ST02 */
  get controlNumber(): string | undefined {
    return this.segments[0]?.get(2);
  }
}

/**
 * Group segments into transaction sets in one forward pass.
 *
 * ISA and GS open an interchange and a group, IEA and GE close them. ST opens
 * a transaction set tagged with the open ISA/GS; every segment from the ST
 * through the matching SE belongs to it. GE and IEA do not close an open set,
 * so an ST without an SE keeps collecting segments until the next ST.
 */
export function deriveTransactionSets(segments: readonly EDISegment[]): EDITransactionSet[] {
  const transactionSets: EDITransactionSet[] = [];
  let transactionSet: EDITransactionSet | null = null;
  let isa: EDISegment | null = null;
  let gs: EDISegment | null = null;

  for (const segment of segments) {
    switch (segment.id.toUpperCase()) {
      case 'ISA':
        isa = segment;
        break;
      case 'GS':
        gs = segment;
        break;
      case 'ST':
        transactionSet = new EDITransactionSet(isa, gs);
        transactionSets.push(transactionSet);
        break;
      case 'GE':
        gs = null;
        break;
      case 'IEA':
        isa = null;
        break;
    }
    if (!transactionSet) {
      continue;
    }
    transactionSet.segments.push(segment);
    if (segment.is('SE')) {
      transactionSet = null;
    }
  }
  return transactionSets;
}
