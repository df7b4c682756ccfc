/**
 * Database row types — mirror the Supabase table schema.
 * Kept separate so storage can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface ExampleRow {
  id: string;
  /** Unique; the dedup fingerprint of the example. */
  fingerprint: string;
  query: string;
  reasoning: string;
  /** Variant tag, duplicated out of tool_call for filtering. */
  tool: string;
  tool_call: unknown; // jsonb
  domain: string;
  persona: string;
  text: string;
  created_at: string;
}

export type ExampleInsert = Omit<ExampleRow, 'id' | 'created_at'>;
