/**
 * In-process stand-in for the Supabase client. Every `from()` call hands out
 * a query builder that records its calls and resolves to the next queued
 * result.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

export interface QueryResult {
  data: unknown;
  error: { message: string } | null;
}

export class FakeQuery implements PromiseLike<QueryResult> {
  readonly calls: unknown[][] = [];

  constructor(private readonly result: QueryResult) {}

  select(...args: unknown[]): this {
    return this.record('select', args);
  }

  eq(...args: unknown[]): this {
    return this.record('eq', args);
  }

  in(...args: unknown[]): this {
    return this.record('in', args);
  }

  is(...args: unknown[]): this {
    return this.record('is', args);
  }

  or(...args: unknown[]): this {
    return this.record('or', args);
  }

  lte(...args: unknown[]): this {
    return this.record('lte', args);
  }

  order(...args: unknown[]): this {
    return this.record('order', args);
  }

  limit(...args: unknown[]): this {
    return this.record('limit', args);
  }

  upsert(...args: unknown[]): this {
    return this.record('upsert', args);
  }

  maybeSingle(): Promise<QueryResult> {
    this.record('maybeSingle', []);
    return Promise.resolve(this.result);
  }

  then<TResult1 = QueryResult, TResult2 = never>(
    onfulfilled?: ((value: QueryResult) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return Promise.resolve(this.result).then(onfulfilled, onrejected);
  }

  private record(method: string, args: unknown[]): this {
    this.calls.push([method, ...args]);
    return this;
  }
}

export class FakeSupabase {
  readonly queries: Array<{ table: string; query: FakeQuery }> = [];
  readonly rpcCalls: Array<{ fn: string; args: unknown }> = [];

  constructor(
    private readonly results: QueryResult[] = [],
    private readonly rpcResult: QueryResult = { data: null, error: null }
  ) {}

  from(table: string): FakeQuery {
    const query = new FakeQuery(this.results.shift() ?? { data: [], error: null });
    this.queries.push({ table, query });
    return query;
  }

  async rpc(fn: string, args: unknown): Promise<QueryResult> {
    this.rpcCalls.push({ fn, args });
    return this.rpcResult;
  }

  lastQuery(): FakeQuery {
    const last = this.queries[this.queries.length - 1];
    if (!last) throw new Error('No query was issued');
    return last.query;
  }

  asClient(): SupabaseClient {
    return this as unknown as SupabaseClient;
  }
}
