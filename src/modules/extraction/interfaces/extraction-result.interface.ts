import type { ExtractionErrorKind } from '../errors';
import type { FieldFlag } from './extracted-field.interface';
import type {
  ExtractionMode,
  PlainPurchaseOrder,
  PurchaseOrderRecord,
} from './purchase-order.interface';

export type RunState =
  | 'Received'
  | 'Rasterized'
  | 'RequestBuilt'
  | 'Submitted'
  | 'Succeeded'
  | 'Failed';

export interface RunTransition {
  state: RunState;
  at: string;
}

export interface ExtractionFailure {
  kind: ExtractionErrorKind;
  message: string;
  /** Model output kept for diagnosis when it could not be parsed. */
  rawText?: string;
  status?: number | null;
  attempts?: number;
  reason?: string;
}

interface RunSummary {
  runId: string;
  filename: string | null;
  mode: ExtractionMode;
  history: RunTransition[];
}

export interface ExtractionSucceeded extends RunSummary {
  status: 'succeeded';
  pageCount: number;
  attempts: number;
  model: string;
  record: PurchaseOrderRecord;
  data: PlainPurchaseOrder;
  flags: FieldFlag[];
  warnings: string[];
}

export interface ExtractionFailed extends RunSummary {
  status: 'failed';
  error: ExtractionFailure;
}

export type ExtractionResult = ExtractionSucceeded | ExtractionFailed;
