import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
  QueryCommand,
  BatchWriteCommand,
  TransactWriteCommand,
  type GetCommandInput,
  type PutCommandInput,
  type UpdateCommandInput,
  type QueryCommandInput,
  type TransactWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { config } from './config.js';

// Create DynamoDB client
const client = new DynamoDBClient({
  region: config.region,
  ...(config.dynamoEndpoint && { endpoint: config.dynamoEndpoint }),
});

// Create document client with marshalling options
export const docClient = DynamoDBDocumentClient.from(client, {
  marshallOptions: {
    removeUndefinedValues: true,
    convertEmptyValues: false,
  },
  unmarshallOptions: {
    wrapNumbers: false,
  },
});

export type WriteRequest =
  | { PutRequest: { Item: Record<string, unknown> } }
  | { DeleteRequest: { Key: Record<string, unknown> } };

// Helper functions for common operations
export async function getItem<T>(params: GetCommandInput): Promise<T | null> {
  const result = await docClient.send(new GetCommand(params));
  return (result.Item as T) || null;
}

export async function putItem(params: PutCommandInput): Promise<void> {
  await docClient.send(new PutCommand(params));
}

export async function updateItem(params: UpdateCommandInput): Promise<void> {
  await docClient.send(new UpdateCommand(params));
}

export async function transactWrite(params: TransactWriteCommandInput): Promise<void> {
  await docClient.send(new TransactWriteCommand(params));
}

export async function queryItems<T>(
  params: QueryCommandInput
): Promise<{ items: T[]; lastEvaluatedKey?: Record<string, unknown> }> {
  const result = await docClient.send(new QueryCommand(params));
  return {
    items: (result.Items as T[]) || [],
    lastEvaluatedKey: result.LastEvaluatedKey as Record<string, unknown> | undefined,
  };
}

/**
 * Write one BatchWriteItem request; returns the requests DynamoDB left
 * unprocessed so the caller can retry them.
 */
export async function batchWrite(tableName: string, requests: WriteRequest[]): Promise<WriteRequest[]> {
  const result = await docClient.send(
    new BatchWriteCommand({ RequestItems: { [tableName]: requests } })
  );
  return (result.UnprocessedItems?.[tableName] as WriteRequest[] | undefined) ?? [];
}

export const BATCH_WRITE_LIMIT = 25;
const MAX_BATCH_ATTEMPTS = 5;

// Chunk to the BatchWriteItem limit and retry unprocessed requests with backoff
export async function batchWriteAll(
  tableName: string,
  requests: WriteRequest[],
  write: typeof batchWrite = batchWrite,
  backoffMs = 50
): Promise<void> {
  for (let offset = 0; offset < requests.length; offset += BATCH_WRITE_LIMIT) {
    let pending = requests.slice(offset, offset + BATCH_WRITE_LIMIT);

    for (let attempt = 1; pending.length > 0; attempt++) {
      if (attempt > MAX_BATCH_ATTEMPTS) {
        throw new Error(`${pending.length} write requests still unprocessed after ${MAX_BATCH_ATTEMPTS} attempts`);
      }
      if (attempt > 1) {
        await new Promise((resolve) => setTimeout(resolve, backoffMs * 2 ** (attempt - 2)));
      }
      pending = await write(tableName, pending);
    }
  }
}
