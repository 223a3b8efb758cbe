import { GraphErrorCode } from '../common/errors/graph-error';
import { ExpansionLayoutOptions } from './expansion-layout';

export const GROUPING_OPTIONS = 'GROUPING_OPTIONS';

export interface GroupingOptions {
  // Deepest allowed chain of groups nested through their parents
  maxDepth: number;
  layout: Partial<ExpansionLayoutOptions>;
}

export const DEFAULT_GROUPING_OPTIONS: GroupingOptions = {
  maxDepth: 5,
  layout: {},
};

export type GroupValidation =
  | { ok: true }
  | { ok: false; code: GraphErrorCode; message: string };
