/**
 * Supabase implementation of IExampleRepository.
 * Writes to the `examples` table; `fingerprint` carries a unique constraint.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { PersistenceError } from '../errors.js';
import type { ExampleInsert } from '../types/database.js';
import type { PersistedExample } from '../types/models.js';
import type { IExampleRepository } from './IExampleRepository.js';

const PAGE_SIZE = 1000;

export class SupabaseExampleRepository implements IExampleRepository {
  constructor(private readonly db: SupabaseClient) {}

  async append(record: PersistedExample): Promise<void> {
    const row: ExampleInsert = {
      fingerprint: record.fingerprint,
      query: record.query,
      reasoning: record.reasoning,
      tool: record.toolCall.tool,
      tool_call: record.toolCall,
      domain: record.domain,
      persona: record.persona,
      text: record.text,
    };

    const { error } = await this.db.from('examples').insert(row);
    if (error) {
      throw new PersistenceError(`Failed to insert example: ${error.message}`, {
        code: error.code,
        fingerprint: record.fingerprint,
      });
    }
  }

  async loadAll(): Promise<unknown[]> {
    const records: unknown[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.db
        .from('examples')
        .select('fingerprint, query, reasoning, tool_call, domain, persona, text')
        .order('created_at', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) throw new PersistenceError(`Failed to fetch examples: ${error.message}`);

      const rows = data ?? [];
      for (const row of rows) {
        records.push({
          fingerprint: row.fingerprint,
          query: row.query,
          reasoning: row.reasoning,
          toolCall: row.tool_call,
          domain: row.domain,
          persona: row.persona,
          text: row.text,
        });
      }
      if (rows.length < PAGE_SIZE) return records;
    }
  }
}
