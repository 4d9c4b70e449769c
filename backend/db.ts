import { decodeOrThrow } from "./decode";
import { ConflictError, notFound } from "./errors";
import {
  schema,
  type DataModel,
  type Doc,
  type TableDefinition,
  type TableName,
} from "./schema";

/**
 * In-process document store.
 *
 * Documents live in one map per table. A transaction works on a private copy
 * of every table and publishes it only when its handler resolves, so a failed
 * handler leaves no partial writes behind. Transactions are queued and run one
 * at a time; reads outside a transaction see the last committed state.
 */

type Tables = { [K in TableName]: Map<number, Doc<K>> };

interface State {
  tables: Tables;
  nextIds: Record<TableName, number>;
}

export interface IndexRange<T> {
  eq<K extends keyof T & string>(field: K, value: T[K]): IndexRange<T>;
}

export interface TableQuery<T extends TableName> {
  withIndex(
    indexName: string,
    range?: (q: IndexRange<DataModel[T]>) => IndexRange<DataModel[T]>,
  ): TableQuery<T>;
  filter(predicate: (doc: Doc<T>) => boolean): TableQuery<T>;
  order(direction: "asc" | "desc"): TableQuery<T>;
  collect(): Promise<Doc<T>[]>;
  first(): Promise<Doc<T> | null>;
  unique(): Promise<Doc<T> | null>;
}

export interface DatabaseReader {
  get<T extends TableName>(table: T, id: number): Promise<Doc<T> | null>;
  query<T extends TableName>(table: T): TableQuery<T>;
}

export interface DatabaseWriter extends DatabaseReader {
  insert<T extends TableName>(table: T, value: DataModel[T]): Promise<number>;
  patch<T extends TableName>(
    table: T,
    id: number,
    value: Partial<DataModel[T]>,
  ): Promise<void>;
  delete<T extends TableName>(table: T, id: number): Promise<void>;
}

export interface Database {
  reader: DatabaseReader;
  transaction<R>(handler: (db: DatabaseWriter) => Promise<R>): Promise<R>;
}

export interface DatabaseOptions {
  now?: () => Date;
}

function emptyState(): State {
  return {
    tables: {
      taggedVariables: new Map(),
      dccReviews: new Map(),
      studyResponses: new Map(),
      dccDecisions: new Map(),
    },
    nextIds: {
      taggedVariables: 1,
      dccReviews: 1,
      studyResponses: 1,
      dccDecisions: 1,
    },
  };
}

function cloneState(state: State): State {
  return {
    tables: {
      taggedVariables: new Map(state.tables.taggedVariables),
      dccReviews: new Map(state.tables.dccReviews),
      studyResponses: new Map(state.tables.studyResponses),
      dccDecisions: new Map(state.tables.dccDecisions),
    },
    nextIds: { ...state.nextIds },
  };
}

class IndexRangeBuilder<T> implements IndexRange<T> {
  readonly conditions: Array<{ field: keyof T & string; value: unknown }> = [];

  eq<K extends keyof T & string>(field: K, value: T[K]): IndexRange<T> {
    this.conditions.push({ field, value });
    return this;
  }
}

class DocumentQuery<T extends TableName> implements TableQuery<T> {
  private readonly predicates: Array<(doc: Doc<T>) => boolean> = [];
  private direction: "asc" | "desc" = "asc";

  constructor(
    private readonly table: T,
    private readonly rows: () => Map<number, Doc<T>>,
  ) {}

  withIndex(
    indexName: string,
    range?: (q: IndexRange<DataModel[T]>) => IndexRange<DataModel[T]>,
  ): TableQuery<T> {
    const definition: TableDefinition<DataModel[T]> = schema[this.table];
    const index = definition.indexes.find((i) => i.name === indexName);
    if (!index) {
      throw new Error(`Index ${indexName} is not defined on ${this.table}`);
    }

    const builder = new IndexRangeBuilder<DataModel[T]>();
    range?.(builder);
    builder.conditions.forEach((condition, position) => {
      if (index.fields[position] !== condition.field) {
        throw new Error(
          `Index ${indexName} on ${this.table} cannot range over "${condition.field}" at position ${position}`,
        );
      }
    });

    this.predicates.push((doc) =>
      builder.conditions.every((c) => doc[c.field] === c.value),
    );
    return this;
  }

  filter(predicate: (doc: Doc<T>) => boolean): TableQuery<T> {
    this.predicates.push(predicate);
    return this;
  }

  order(direction: "asc" | "desc"): TableQuery<T> {
    this.direction = direction;
    return this;
  }

  async collect(): Promise<Doc<T>[]> {
    const docs = [...this.rows().values()].filter((doc) =>
      this.predicates.every((predicate) => predicate(doc)),
    );
    docs.sort((a, b) => a._id - b._id);
    if (this.direction === "desc") docs.reverse();
    return docs;
  }

  async first(): Promise<Doc<T> | null> {
    const docs = await this.collect();
    return docs[0] ?? null;
  }

  async unique(): Promise<Doc<T> | null> {
    const docs = await this.collect();
    if (docs.length > 1) {
      throw new Error(
        `unique() matched ${docs.length} documents in ${this.table}`,
      );
    }
    return docs[0] ?? null;
  }
}

function assertUniqueIndexes<T extends TableName>(
  table: T,
  rows: Map<number, Doc<T>>,
  doc: Doc<T>,
): void {
  const definition: TableDefinition<DataModel[T]> = schema[table];
  for (const index of definition.indexes) {
    if (!index.unique) continue;
    for (const other of rows.values()) {
      if (
        other._id !== doc._id &&
        index.fields.every((field) => other[field] === doc[field])
      ) {
        throw new ConflictError({
          reason: "duplicate",
          message: `Duplicate ${table} document for unique index ${index.name}`,
        });
      }
    }
  }
}

function createReader(state: () => State): DatabaseReader {
  return {
    async get<T extends TableName>(table: T, id: number): Promise<Doc<T> | null> {
      const rows: Map<number, Doc<T>> = state().tables[table];
      return rows.get(id) ?? null;
    },
    query<T extends TableName>(table: T): TableQuery<T> {
      return new DocumentQuery(table, (): Map<number, Doc<T>> => state().tables[table]);
    },
  };
}

function createWriter(state: State, now: () => Date): DatabaseWriter {
  const reader = createReader(() => state);
  return {
    ...reader,

    async insert<T extends TableName>(table: T, value: DataModel[T]): Promise<number> {
      const definition: TableDefinition<DataModel[T]> = schema[table];
      const fields = decodeOrThrow(table, definition.document, value);
      const id = state.nextIds[table];
      const doc = { ...fields, _id: id, _creationTime: now().getTime() };
      const rows: Map<number, Doc<T>> = state.tables[table];
      assertUniqueIndexes(table, rows, doc);
      rows.set(id, doc);
      state.nextIds[table] = id + 1;
      return id;
    },

    async patch<T extends TableName>(
      table: T,
      id: number,
      value: Partial<DataModel[T]>,
    ): Promise<void> {
      const rows: Map<number, Doc<T>> = state.tables[table];
      const existing = rows.get(id);
      if (!existing) throw notFound(table, id);
      const definition: TableDefinition<DataModel[T]> = schema[table];
      const fields = decodeOrThrow(table, definition.document, {
        ...existing,
        ...value,
      });
      const doc = {
        ...fields,
        _id: existing._id,
        _creationTime: existing._creationTime,
      };
      assertUniqueIndexes(table, rows, doc);
      rows.set(id, doc);
    },

    async delete<T extends TableName>(table: T, id: number): Promise<void> {
      const rows: Map<number, Doc<T>> = state.tables[table];
      if (!rows.delete(id)) throw notFound(table, id);
    },
  };
}

export function createDatabase(options: DatabaseOptions = {}): Database {
  const now = options.now ?? (() => new Date());
  let committed = emptyState();
  let queue: Promise<unknown> = Promise.resolve();

  function transaction<R>(
    handler: (db: DatabaseWriter) => Promise<R>,
  ): Promise<R> {
    const run = async () => {
      const working = cloneState(committed);
      const result = await handler(createWriter(working, now));
      committed = working;
      return result;
    };
    const next = queue.then(run, run);
    // The caller observes the outcome through `next`; the queue only orders.
    queue = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  return {
    reader: createReader(() => committed),
    transaction,
  };
}
