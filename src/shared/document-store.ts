/**
 * A key-document store accessed by typed filters. Collections are declared
 * as a map from collection name to document type; every document carries a
 * string `id` assigned by the store.
 */

export interface StoredDocument {
  id: string;
}

export type CollectionMap = { [collection: string]: StoredDocument };

export type FieldOf<T> = Extract<keyof T, string>;

export type ConditionOp = 'eq' | 'gte' | 'lte';

/** One typed filter clause; a query is the conjunction of its clauses. */
export interface Condition<T, F extends FieldOf<T> = FieldOf<T>> {
  field: F;
  op: ConditionOp;
  value: T[F];
}

export type Query<T> = readonly Condition<T>[];

export type NewDocument<T extends StoredDocument> = Omit<T, 'id'>;

export type Patch<T extends StoredDocument> = Partial<Omit<T, 'id'>>;

export interface CreateOptions<T> {
  /** Field whose value must be unique across the collection. */
  unique?: FieldOf<Omit<T, 'id'>>;
}

export interface DocumentStore<S extends CollectionMap> {
  create<C extends FieldOf<S>>(collection: C, doc: NewDocument<S[C]>, options?: CreateOptions<S[C]>): Promise<string>;
  get<C extends FieldOf<S>>(collection: C, id: string): Promise<S[C] | null>;
  find<C extends FieldOf<S>>(collection: C, query: Query<S[C]>, limit: number): Promise<S[C][]>;
  /**
   * Applies `patch` to one document in a single conditional write. Resolves
   * `false` when the document does not exist or `when` does not hold.
   */
  update<C extends FieldOf<S>>(collection: C, id: string, patch: Patch<S[C]>, when?: Query<S[C]>): Promise<boolean>;
  ping(): Promise<void>;
  close(): void;
}

/** Typed query builder for one collection's documents. */
export function where<T>() {
  return {
    eq: <F extends FieldOf<T>>(field: F, value: T[F]): Condition<T> => ({ field, op: 'eq', value }),
    gte: <F extends FieldOf<T>>(field: F, value: T[F]): Condition<T> => ({ field, op: 'gte', value }),
    lte: <F extends FieldOf<T>>(field: F, value: T[F]): Condition<T> => ({ field, op: 'lte', value }),
  };
}
