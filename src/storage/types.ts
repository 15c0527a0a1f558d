/**
 * Storage Types
 */

export interface StorageConfig {
  /** Database file path, or ':memory:' */
  sqlitePath: string;
  enableWAL: boolean;
}

export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  sqlitePath: ':memory:',
  enableWAL: false
};

export interface RecordRow {
  seq: number;
  id: string;
  chain_id: string;
  request_json: string;
  plan_json: string;
  status: string;
  score: number;
  execution_time_ms: number;
  providers_used: string;
  error: string | null;
  user_satisfaction: number | null;
  learning_value: string;
  created_at: string;
}

export interface WeightRow {
  provider_id: string;
  use_count: number;
  success_count: number;
  avg_score: number;
  avg_latency_ms: number;
  updated_at: string;
}
