// --------------------
// Declared schema
// --------------------
export interface Field {
  id: string;
  distinct: boolean; // discovered values may seed further lookups
}

export interface RelationField {
  id: string;    // references Field.id
  query: string; // SQL expression, or dotted document path for mongo
}

export interface Relation {
  name: string;
  connect: string; // connection descriptor, e.g. "sqlite://./users.db"
  tableName: string;
  fields: RelationField[];
}

// --------------------
// Lookups
// --------------------
/** One matched row: extracted value per declared field id. Missing/null values are omitted. */
export type LookupRow = Record<string, string>;

export interface LookupOptions {
  signal?: AbortSignal;
}

export interface HealthStatus {
  ok: boolean;
  details?: string;
}

// --------------------
// Adapter
// --------------------
export interface RelationAdapter {
  readonly kind: 'sql' | 'mongodb';
  readonly relation: Relation;
  lookup(field: string, value: string, opts?: LookupOptions): Promise<LookupRow[]>;
  health(): Promise<HealthStatus>;
  close(): Promise<void>;
}

// --------------------
// Resolution
// --------------------
export interface Seed {
  field: string;
  value: string;
}

/** Unit of work and of deduplication during one resolution. */
export interface LookupUnit {
  relation: string;
  field: string;
  value: string;
}

export interface ResolveStats {
  rounds: number;
  lookups: number;
}

export interface ResolveResponse {
  success: boolean;
  message: string;
  data: Record<string, string[]>;
  stats: ResolveStats;
}
