/**
 * AWS SDK v3 raw DynamoDB client adapter.
 *
 * Uses the raw `@aws-sdk/client-dynamodb` client with AttributeValue format.
 * The client and its commands are typed structurally, so the SDK is not a
 * dependency of this package.
 */

import type { BatchWriteEntry, BatchWriteRequest, SDKAdapter } from "./adapter.js";
import type { AttributeMap } from "../marshalling/types.js";

/** Minimal interface for the AWS SDK v3 DynamoDBClient. */
export interface DynamoDBClientV3 {
  send(command: unknown): Promise<unknown>;
}

/** Minimal command constructor shape. */
export interface CommandConstructor {
  new (input: unknown): unknown;
}

/** The command constructors the adapter sends. */
export interface SDKv3Commands {
  readonly PutItemCommand: CommandConstructor;
  readonly GetItemCommand: CommandConstructor;
  readonly DeleteItemCommand: CommandConstructor;
  readonly UpdateItemCommand: CommandConstructor;
  readonly QueryCommand: CommandConstructor;
  readonly BatchWriteItemCommand: CommandConstructor;
  readonly BatchGetItemCommand: CommandConstructor;
}

type RawWriteRequest = {
  PutRequest?: { Item: AttributeMap };
  DeleteRequest?: { Key: AttributeMap };
};

const toRawWrite = (entry: BatchWriteEntry): RawWriteRequest =>
  entry.type === "put"
    ? { PutRequest: { Item: entry.item } }
    : { DeleteRequest: { Key: entry.key } };

const fromRawWrite = (raw: RawWriteRequest): BatchWriteEntry | undefined => {
  if (raw.PutRequest) return { type: "put", item: raw.PutRequest.Item };
  if (raw.DeleteRequest) return { type: "delete", key: raw.DeleteRequest.Key };
  return undefined;
};

/**
 * Creates an SDK adapter for the raw AWS SDK v3 DynamoDB client.
 *
 * @param client - An instance of `DynamoDBClient` from `@aws-sdk/client-dynamodb`
 * @param commands - The command constructors from `@aws-sdk/client-dynamodb`
 * @returns A frozen {@link SDKAdapter}
 *
 * @example
 * ```ts
 * import {
 *   DynamoDBClient, PutItemCommand, GetItemCommand, DeleteItemCommand,
 *   UpdateItemCommand, QueryCommand, BatchWriteItemCommand, BatchGetItemCommand,
 * } from "@aws-sdk/client-dynamodb";
 *
 * const adapter = createSDKv3Adapter(new DynamoDBClient({}), {
 *   PutItemCommand, GetItemCommand, DeleteItemCommand, UpdateItemCommand,
 *   QueryCommand, BatchWriteItemCommand, BatchGetItemCommand,
 * });
 * ```
 */
export const createSDKv3Adapter = (
  client: DynamoDBClientV3,
  commands: SDKv3Commands,
): SDKAdapter =>
  Object.freeze({
    putItem: async (input) => {
      const result = (await client.send(
        new commands.PutItemCommand({
          TableName: input.tableName,
          Item: input.item,
          ConditionExpression: input.conditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
          ExpressionAttributeValues: input.expressionAttributeValues,
        }),
      )) as { Attributes?: AttributeMap };
      return { attributes: result.Attributes };
    },

    getItem: async (input) => {
      const result = (await client.send(
        new commands.GetItemCommand({
          TableName: input.tableName,
          Key: input.key,
          ConsistentRead: input.consistentRead,
          ProjectionExpression: input.projectionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
        }),
      )) as { Item?: AttributeMap };
      return { item: result.Item };
    },

    deleteItem: async (input) => {
      const result = (await client.send(
        new commands.DeleteItemCommand({
          TableName: input.tableName,
          Key: input.key,
          ConditionExpression: input.conditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
          ExpressionAttributeValues: input.expressionAttributeValues,
          ReturnValues: input.returnValues,
        }),
      )) as { Attributes?: AttributeMap };
      return { attributes: result.Attributes };
    },

    updateItem: async (input) => {
      const result = (await client.send(
        new commands.UpdateItemCommand({
          TableName: input.tableName,
          Key: input.key,
          UpdateExpression: input.updateExpression,
          ConditionExpression: input.conditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
          ExpressionAttributeValues: input.expressionAttributeValues,
          ReturnValues: input.returnValues,
        }),
      )) as { Attributes?: AttributeMap };
      return { attributes: result.Attributes };
    },

    query: async (input) => {
      const result = (await client.send(
        new commands.QueryCommand({
          TableName: input.tableName,
          IndexName: input.indexName,
          KeyConditionExpression: input.keyConditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
          ExpressionAttributeValues: input.expressionAttributeValues,
          Limit: input.limit,
          ExclusiveStartKey: input.exclusiveStartKey,
          ScanIndexForward: input.scanIndexForward,
          ConsistentRead: input.consistentRead,
          ProjectionExpression: input.projectionExpression,
        }),
      )) as {
        Items?: AttributeMap[];
        Count?: number;
        LastEvaluatedKey?: AttributeMap;
      };
      return {
        items: result.Items ?? [],
        count: result.Count ?? 0,
        lastEvaluatedKey: result.LastEvaluatedKey,
      };
    },

    batchWriteItem: async (requests) => {
      const requestItems: Record<string, RawWriteRequest[]> = {};
      for (const req of requests) {
        requestItems[req.tableName] = req.requests.map(toRawWrite);
      }

      const result = (await client.send(
        new commands.BatchWriteItemCommand({ RequestItems: requestItems }),
      )) as { UnprocessedItems?: Record<string, RawWriteRequest[]> };

      const unprocessed: BatchWriteRequest[] = [];
      for (const [tableName, reqs] of Object.entries(result.UnprocessedItems ?? {})) {
        const entries: BatchWriteEntry[] = [];
        for (const r of reqs) {
          const entry = fromRawWrite(r);
          if (entry) entries.push(entry);
        }
        if (entries.length > 0) unprocessed.push({ tableName, requests: entries });
      }

      return { unprocessedItems: unprocessed };
    },

    batchGetItem: async (requests) => {
      const requestItems: Record<string, Record<string, unknown>> = {};
      for (const req of requests) {
        requestItems[req.tableName] = {
          Keys: req.keys,
          ConsistentRead: req.consistentRead,
          ProjectionExpression: req.projectionExpression,
          ExpressionAttributeNames: req.expressionAttributeNames,
        };
      }

      const result = (await client.send(
        new commands.BatchGetItemCommand({ RequestItems: requestItems }),
      )) as {
        Responses?: Record<string, AttributeMap[]>;
        UnprocessedKeys?: Record<string, { Keys: AttributeMap[] }>;
      };

      const unprocessed: Array<{ tableName: string; keys: AttributeMap[] }> = [];
      for (const [tableName, data] of Object.entries(result.UnprocessedKeys ?? {})) {
        if (data.Keys.length > 0) unprocessed.push({ tableName, keys: data.Keys });
      }

      return {
        responses: result.Responses ?? {},
        unprocessedKeys: unprocessed,
      };
    },
  } satisfies SDKAdapter);
