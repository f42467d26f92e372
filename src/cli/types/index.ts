/**
 * CLI-specific type definitions
 */

import type { EDIDelimiters } from '../../datatypes/edi/EDIOptions.js';
import type { EDIMetaData } from '../../datatypes/edi/EDIMetaData.js';

// =============================================================================
// Command Options
// =============================================================================

/**
 * Global CLI options available on all commands
 */
export interface GlobalOptions {
  verbose?: boolean;
}

/**
 * Delimiter flags shared by the commands that read or write EDI text.
 * Values arrive already unescaped.
 */
export type DelimiterOptions = EDIDelimiters;

export interface OutputOptions {
  /** Write to this file instead of stdout */
  output?: string;
}

export interface ToXmlOptions extends DelimiterOptions, OutputOptions {
  root?: string;
  loops?: boolean;
  pretty?: boolean;
}

export interface FromXmlOptions extends DelimiterOptions, OutputOptions {
  lineBreak?: boolean;
}

export interface FormatOptions extends DelimiterOptions, OutputOptions {
  lineBreak?: boolean;
}

export interface InspectOptions extends DelimiterOptions {
  json?: boolean;
}

// =============================================================================
// Inspect Report
// =============================================================================

export interface TransactionSetSummary {
  /** 1-based position among the document's transaction sets */
  index: number;
  transactionSetId?: string;
  controlNumber?: string;
  /** GS06 of the enclosing functional group */
  groupControlNumber?: string;
  /** ISA13 of the enclosing interchange */
  interchangeControlNumber?: string;
  segmentCount: number;
}

export interface InspectReport {
  segmentCount: number;
  delimiters: EDIDelimiters;
  metadata: EDIMetaData;
  transactionSets: TransactionSetSummary[];
}
