/**
 * Summary fields of an interchange:
 * - source: ISA06 (interchange sender), else GS02 (application sender)
 * - type: ST01 of the first transaction set
 * - version: GS08
 */

import type { EDISegment } from '../../model/EDISegment.js';

export interface EDIMetaData {
  source?: string;
  type?: string;
  version?: string;
}

function firstValue(segments: readonly EDISegment[], id: string, position: number): string | undefined {
  for (const segment of segments) {
    if (!segment.is(id)) continue;
    const value = segment.get(position)?.trim();
    if (value) return value;
  }
  return undefined;
}

export function extractEDIMetaData(segments: readonly EDISegment[]): EDIMetaData {
  const metadata: EDIMetaData = {};

  const source = firstValue(segments, 'ISA', 6) ?? firstValue(segments, 'GS', 2);
  if (source !== undefined) metadata.source = source;

  const type = firstValue(segments, 'ST', 1);
  if (type !== undefined) metadata.type = type;

  const version = firstValue(segments, 'GS', 8);
  if (version !== undefined) metadata.version = version;

  return metadata;
}
