import { randomUUID } from 'crypto';
import {
  ConditionalCheckFailedException,
  DynamoDBClient,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  ScanCommand,
  TransactWriteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import type { DatabaseConfig } from './config';
import type {
  CollectionMap,
  ConditionOp,
  CreateOptions,
  DocumentStore,
  FieldOf,
  NewDocument,
  Patch,
  Query,
} from './document-store';
import { DuplicateDocumentError } from './errors';

const OPERATORS: Record<ConditionOp, string> = { eq: '=', gte: '>=', lte: '<=' };

/** Collects placeholder names and values while compiling expressions. */
class ExpressionBuilder {
  readonly names: Record<string, string> = {};
  readonly values: Record<string, unknown> = {};
  private nameCount = 0;
  private valueCount = 0;

  name(field: string): string {
    const placeholder = `#f${this.nameCount++}`;
    this.names[placeholder] = field;
    return placeholder;
  }

  value(value: unknown): string {
    const placeholder = `:v${this.valueCount++}`;
    this.values[placeholder] = value;
    return placeholder;
  }

  conditions<T>(query: Query<T>): string[] {
    return query.map((condition) => `${this.name(condition.field)} ${OPERATORS[condition.op]} ${this.value(condition.value)}`);
  }

  attributes(): {
    ExpressionAttributeNames?: Record<string, string>;
    ExpressionAttributeValues?: Record<string, unknown>;
  } {
    return {
      ...(Object.keys(this.names).length > 0 ? { ExpressionAttributeNames: this.names } : {}),
      ...(Object.keys(this.values).length > 0 ? { ExpressionAttributeValues: this.values } : {}),
    };
  }
}

/**
 * DynamoDB-backed document store. Each collection is its own table named
 * `<prefix>-<collection>` with partition key `id`; uniqueness guards live in
 * `<prefix>-uniques`.
 */
export class DynamoDocumentStore<S extends CollectionMap> implements DocumentStore<S> {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly tablePrefix: string,
  ) {}

  tableName(collection: string): string {
    return `${this.tablePrefix}-${collection}`;
  }

  async create<C extends FieldOf<S>>(collection: C, doc: NewDocument<S[C]>, options?: CreateOptions<S[C]>): Promise<string> {
    const id = randomUUID();
    const put = {
      TableName: this.tableName(collection),
      Item: { ...doc, id },
      ConditionExpression: 'attribute_not_exists(id)',
    };

    const field = options?.unique;
    if (field === undefined) {
      await this.client.send(new PutCommand(put));
      return id;
    }

    const value = doc[field];
    try {
      await this.client.send(
        new TransactWriteCommand({
          TransactItems: [
            { Put: put },
            {
              Put: {
                TableName: this.tableName('uniques'),
                Item: { id: `${collection}#${field}#${String(value)}`, collection, field, owner: id },
                ConditionExpression: 'attribute_not_exists(id)',
              },
            },
          ],
        })
      );
      return id;
    } catch (err) {
      if (err instanceof TransactionCanceledException && err.CancellationReasons?.[1]?.Code === 'ConditionalCheckFailed') {
        throw new DuplicateDocumentError(collection, field, value);
      }
      throw err;
    }
  }

  async get<C extends FieldOf<S>>(collection: C, id: string): Promise<S[C] | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName(collection),
        Key: { id },
        ConsistentRead: true,
      })
    );

    return result.Item ? (result.Item as S[C]) : null;
  }

  async find<C extends FieldOf<S>>(collection: C, query: Query<S[C]>, limit: number): Promise<S[C][]> {
    const expression = new ExpressionBuilder();
    const clauses = expression.conditions(query);
    const filter = {
      ...(clauses.length > 0 ? { FilterExpression: clauses.join(' AND ') } : {}),
      ...expression.attributes(),
    };

    const items: S[C][] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const page = await this.client.send(
        new ScanCommand({
          TableName: this.tableName(collection),
          ConsistentRead: true,
          ExclusiveStartKey: startKey,
          ...filter,
        })
      );
      for (const item of page.Items ?? []) {
        items.push(item as S[C]);
        if (items.length >= limit) {
          return items;
        }
      }
      startKey = page.LastEvaluatedKey;
    } while (startKey);

    return items;
  }

  async update<C extends FieldOf<S>>(collection: C, id: string, patch: Patch<S[C]>, when: Query<S[C]> = []): Promise<boolean> {
    const expression = new ExpressionBuilder();
    const assignments = Object.entries(patch)
      .filter(([, value]) => value !== undefined)
      .map(([field, value]) => `${expression.name(field)} = ${expression.value(value)}`);
    if (assignments.length === 0) {
      throw new Error(`Empty update for ${collection}/${id}`);
    }

    const conditions = [`attribute_exists(${expression.name('id')})`, ...expression.conditions(when)];

    try {
      await this.client.send(
        new UpdateCommand({
          TableName: this.tableName(collection),
          Key: { id },
          UpdateExpression: `SET ${assignments.join(', ')}`,
          ConditionExpression: conditions.join(' AND '),
          ...expression.attributes(),
        })
      );
      return true;
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw err;
    }
  }

  async ping(): Promise<void> {
    await this.client.send(new ScanCommand({ TableName: this.tableName('uniques'), Limit: 1 }));
  }

  close(): void {
    this.client.destroy();
  }
}

export function openDynamoStore<S extends CollectionMap>(config: DatabaseConfig): DynamoDocumentStore<S> {
  const client = DynamoDBDocumentClient.from(
    new DynamoDBClient({ region: config.region, ...(config.endpoint ? { endpoint: config.endpoint } : {}) }),
    { marshallOptions: { removeUndefinedValues: true } }
  );
  return new DynamoDocumentStore<S>(client, config.tablePrefix);
}
