export type SourceTable = {
  table_id: number;
  schema: string;
  name: string;
  /**
   * False for tables that cannot be replicated, e.g. without a primary or unique key.
   */
  eligible: boolean;
};

/**
 * The upstream cluster, as far as the control plane needs to know it.
 */
export interface SourceSchema {
  listTables(): Promise<SourceTable[]>;
  /**
   * Current upstream timestamp. Used as the default `start_ts` of new changefeeds.
   */
  currentTs(): Promise<number>;
}

export const qualifiedTableName = (table: SourceTable) => `${table.schema}.${table.name}`;

/**
 * Source described by the service configuration. Timestamps are wall clock milliseconds.
 */
export class StaticSourceSchema implements SourceSchema {
  constructor(private tables: SourceTable[]) {}

  async listTables(): Promise<SourceTable[]> {
    return this.tables.map((table) => ({ ...table }));
  }

  async currentTs(): Promise<number> {
    return Date.now();
  }
}
