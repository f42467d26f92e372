/**
 * EDI document model
 */

export { EDIDocument } from './EDIDocument.js';
export { EDISegment } from './EDISegment.js';
export { EDIElement } from './EDIElement.js';
export { EDIRepetition } from './EDIRepetition.js';
export { EDIComponent } from './EDIComponent.js';
export { EDITransactionSet, deriveTransactionSets } from './EDITransactionSet.js';
