import { runFeedSync, showKnownSetSummary } from '../lib/actions';

export interface TypeChoice {
  label: string;
  action: () => Promise<boolean>;
}

export const typeChoices: TypeChoice[] = [
  { label: 'Run Feed Sync', action: runFeedSync },
  { label: 'Show Known SKU Summary', action: showKnownSetSummary },
];
