// --------------------
// Documents & rows
// --------------------
export type Document = Record<string, unknown>;

// Store-native row; ids and dates stay driver types until formatting.
export type Row = Document;

// --------------------
// QuerySpec (wire form produced by the model)
// --------------------
export type JoinType = 'lookup' | 'match';

export interface JoinSpec {
  collection: string;
  type: JoinType;
  local_field: string;
  foreign_field: string;
  as: string;
}

export type SortValue = number | string | Document;

export interface QuerySpec {
  primary_collection: string;
  filter: Document;
  projection: Document;
  sort: Record<string, SortValue>;
  limit: number;
  aggregation: Document[];
  joins: JoinSpec[];
}

// --------------------
// ExecutionPlan: one of two mutually exclusive strategies
// --------------------
export interface FindPlan {
  kind: 'find';
  collection: string;
  filter: Document;
  projection: Document;
  sort: Record<string, SortValue>;
  limit: number;
}

export interface AggregatePlan {
  kind: 'aggregate';
  collection: string;
  pipeline: Document[];
  limit: number;
}

export type ExecutionPlan = FindPlan | AggregatePlan;

// --------------------
// Store adapter
// --------------------
export interface FindParams {
  filter: Document;
  projection?: Document;
  sort?: Record<string, SortValue>;
  limit: number;
}

export interface AggregateParams {
  pipeline: Document[];
}

export type NativeQuery =
  | { operation: 'find'; collection: string; params: FindParams }
  | { operation: 'aggregate'; collection: string; params: AggregateParams };

export type NativeOperation = NativeQuery['operation'];

export interface StoreHealth {
  ok: boolean;
  error?: string;
}

export interface DocumentStore {
  name: string;
  initialize(): Promise<void>;
  switchCollection(name: string): Promise<void>;
  executeNativeQuery(query: NativeQuery): Promise<Row[]>;
  health?(): Promise<StoreHealth>;
  close?(): Promise<void>;
}

// --------------------
// Language model
// --------------------
export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ModelClient {
  name?: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

// --------------------
// Response envelope
// --------------------
export type QueryType = 'find' | 'aggregation';

export interface FormattedResponse {
  query_info: {
    primary_collection: string;
    query_type: QueryType;
    limit: number;
    joins: JoinSpec[];
    generated_query: QuerySpec;
  };
  results: {
    total_count: number;
    data: unknown[];
  };
  summary: {
    execution_time: string;
    result_count: number;
    collections_involved: string[];
  };
}

export interface FormatFailure {
  error: string;
  raw_results: unknown[];
}

export type FormatOutcome = FormattedResponse | FormatFailure;

export type JoinStrategy = 'lookup' | 'application' | (string & {});

export interface QueryRequest {
  userRequest: string;
  schemaText: string;
  limit?: number;
  includeAggregation?: boolean;
  joinStrategy?: JoinStrategy;
}
