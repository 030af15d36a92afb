import { ConditionalCheckFailedException, TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  ScanCommand,
  TransactWriteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { where } from '../src/shared/document-store';
import { DynamoDocumentStore } from '../src/shared/dynamo-store';
import { DuplicateDocumentError } from '../src/shared/errors';
import type { CodeKey, StorefrontCollections } from '../src/storefront/types';

// ---------------------------------------------------------------------------
// Mocked document client
// ---------------------------------------------------------------------------

const send = jest.fn();
const destroy = jest.fn();
const client = { send, destroy } as unknown as DynamoDBDocumentClient;

const store = new DynamoDocumentStore<StorefrontCollections>(client, 'test');
const codeKey = where<CodeKey>();

const CODE: Omit<CodeKey, 'id'> = {
  product_id: 'p-1',
  code: 'AAAA-1',
  assigned: false,
  order_id: null,
  created_at: '2024-01-01T00:00:00.000Z',
  updated_at: '2024-01-01T00:00:00.000Z',
};

function sentCommand<T>(index: number, type: new (...args: never[]) => T): T {
  const command: unknown = send.mock.calls[index]?.[0];
  expect(command).toBeInstanceOf(type);
  return command as T;
}

beforeEach(() => {
  send.mockReset();
  destroy.mockReset();
});

// ---------------------------------------------------------------------------
// create
// ---------------------------------------------------------------------------

test('create puts the document into <prefix>-<collection> with a generated id', async () => {
  send.mockResolvedValue({});

  const id = await store.create('codekey', CODE);

  const command = sentCommand(0, PutCommand);
  expect(command.input).toEqual({
    TableName: 'test-codekey',
    Item: { ...CODE, id },
    ConditionExpression: 'attribute_not_exists(id)',
  });
});

test('create with a unique field writes a guard item in the same transaction', async () => {
  send.mockResolvedValue({});

  const id = await store.create('codekey', CODE, { unique: 'code' });

  const command = sentCommand(0, TransactWriteCommand);
  expect(command.input.TransactItems).toEqual([
    { Put: { TableName: 'test-codekey', Item: { ...CODE, id }, ConditionExpression: 'attribute_not_exists(id)' } },
    {
      Put: {
        TableName: 'test-uniques',
        Item: { id: 'codekey#code#AAAA-1', collection: 'codekey', field: 'code', owner: id },
        ConditionExpression: 'attribute_not_exists(id)',
      },
    },
  ]);
});

test('a cancelled guard write surfaces as DuplicateDocumentError', async () => {
  send.mockRejectedValue(
    new TransactionCanceledException({
      message: 'Transaction cancelled',
      $metadata: {},
      CancellationReasons: [{ Code: 'None' }, { Code: 'ConditionalCheckFailed' }],
    })
  );

  await expect(store.create('codekey', CODE, { unique: 'code' })).rejects.toBeInstanceOf(DuplicateDocumentError);
});

// ---------------------------------------------------------------------------
// get / find
// ---------------------------------------------------------------------------

test('get returns null for a missing document', async () => {
  send.mockResolvedValue({});

  await expect(store.get('order', 'missing')).resolves.toBeNull();
  expect(sentCommand(0, GetCommand).input).toEqual({ TableName: 'test-order', Key: { id: 'missing' }, ConsistentRead: true });
});

test('find compiles typed conditions into a filter expression', async () => {
  send.mockResolvedValue({ Items: [] });

  await store.find('codekey', [codeKey.eq('product_id', 'p-1'), codeKey.eq('assigned', false)], 5);

  expect(sentCommand(0, ScanCommand).input).toEqual({
    TableName: 'test-codekey',
    ConsistentRead: true,
    ExclusiveStartKey: undefined,
    FilterExpression: '#f0 = :v0 AND #f1 = :v1',
    ExpressionAttributeNames: { '#f0': 'product_id', '#f1': 'assigned' },
    ExpressionAttributeValues: { ':v0': 'p-1', ':v1': false },
  });
});

test('find pages through the table until the limit is reached', async () => {
  send
    .mockResolvedValueOnce({ Items: [{ id: 'a' }], LastEvaluatedKey: { id: 'a' } })
    .mockResolvedValueOnce({ Items: [{ id: 'b' }, { id: 'c' }], LastEvaluatedKey: { id: 'c' } });

  const found = await store.find('codekey', [], 2);

  expect(found.map(doc => doc.id)).toEqual(['a', 'b']);
  expect(send).toHaveBeenCalledTimes(2);
  expect(sentCommand(1, ScanCommand).input.ExclusiveStartKey).toEqual({ id: 'a' });
});

test('find without conditions sends no filter', async () => {
  send.mockResolvedValue({ Items: [] });

  await store.find('order', [], 50);

  expect(sentCommand(0, ScanCommand).input).toEqual({ TableName: 'test-order', ConsistentRead: true, ExclusiveStartKey: undefined });
});

// ---------------------------------------------------------------------------
// update
// ---------------------------------------------------------------------------

test('update is one conditional write on the document', async () => {
  send.mockResolvedValue({});

  const updated = await store.update('codekey', 'c-1', { assigned: true, order_id: 'o-1' }, [codeKey.eq('assigned', false)]);

  expect(updated).toBe(true);
  expect(sentCommand(0, UpdateCommand).input).toEqual({
    TableName: 'test-codekey',
    Key: { id: 'c-1' },
    UpdateExpression: 'SET #f0 = :v0, #f1 = :v1',
    ConditionExpression: 'attribute_exists(#f2) AND #f3 = :v2',
    ExpressionAttributeNames: { '#f0': 'assigned', '#f1': 'order_id', '#f2': 'id', '#f3': 'assigned' },
    ExpressionAttributeValues: { ':v0': true, ':v1': 'o-1', ':v2': false },
  });
});

test('a failed condition resolves false', async () => {
  send.mockRejectedValue(new ConditionalCheckFailedException({ message: 'The conditional request failed', $metadata: {} }));

  await expect(store.update('codekey', 'c-1', { assigned: true }, [codeKey.eq('assigned', false)])).resolves.toBe(false);
});

test('other errors propagate', async () => {
  send.mockRejectedValue(new Error('throttled'));

  await expect(store.update('codekey', 'c-1', { assigned: true })).rejects.toThrow('throttled');
});

test('close destroys the client', () => {
  store.close();

  expect(destroy).toHaveBeenCalledTimes(1);
});
