// Wire format of the remote ingestion API (POST /api/public/ingestion).

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type EnvelopeType =
  | "trace-create"
  | "trace-update"
  | "span-create"
  | "span-update"
  | "event-create"
  | "generation-create"
  | "generation-update"
  | "score-create";

/** "DEFAULT" for ok, "ERROR" for error, "WARNING" for cancelled. */
export type WireLevel = "DEBUG" | "DEFAULT" | "WARNING" | "ERROR";

/**
 * Outer wrapper of every ingested record. `id` is the dedup key of the
 * event itself; `body.id` is the identity of the trace or observation the
 * event creates or updates.
 */
export interface IngestionEnvelope {
  id:        string;
  /** ISO 8601, millisecond precision, "Z" suffix */
  timestamp: string;
  type:      EnvelopeType;
  body:      JsonObject;
}

/** Request body. One envelope per request in practice, see IngestClient. */
export interface IngestionBatch {
  batch: IngestionEnvelope[];
}

/** Usage object in the shape the ingestion API expects. */
export interface WireUsage {
  [key: string]: JsonValue;
  input:       number;
  output:      number;
  total:       number;
  unit:        string;
  input_cost:  number | null;
  output_cost: number | null;
  total_cost:  number | null;
}
