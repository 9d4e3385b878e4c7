import { FeedRowInvalidReasonEnum } from '../lib/errors';

export enum RunStatusEnum {
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
}

export interface ParseFailureDetail {
  row: number;
  sku?: string;
  reason: FeedRowInvalidReasonEnum;
  message: string;
}

export interface RunSummary {
  rowsRead: number;
  created: number;
  updated: number;
  archived: number;
  reactivated: number;
  flaggedDiscontinued: number;
  parseFailures: number;
  failures: ParseFailureDetail[];
}

export function emptyRunSummary(): RunSummary {
  return {
    rowsRead: 0,
    created: 0,
    updated: 0,
    archived: 0,
    reactivated: 0,
    flaggedDiscontinued: 0,
    parseFailures: 0,
    failures: [],
  };
}
