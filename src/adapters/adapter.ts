/**
 * SDK adapter interface for abstracting over DynamoDB client implementations.
 *
 * Each adapter is a record of functions (not a class). Items, keys and
 * expression values travel as raw tagged attribute maps.
 */

import type { AttributeMap } from "../marshalling/types.js";

/** Common options for all DynamoDB operations. */
export interface BaseOperationInput {
  readonly tableName: string;
}

/** Name and value maps of a request's expressions. */
export interface ExpressionAttributes {
  readonly expressionAttributeNames?: Readonly<Record<string, string>> | undefined;
  readonly expressionAttributeValues?: AttributeMap | undefined;
}

/** Input for PutItem. */
export interface PutItemInput extends BaseOperationInput, ExpressionAttributes {
  readonly item: AttributeMap;
  readonly conditionExpression?: string | undefined;
}

/** Output for PutItem. */
export interface PutItemOutput {
  readonly attributes?: AttributeMap | undefined;
}

/** Input for GetItem. */
export interface GetItemInput extends BaseOperationInput {
  readonly key: AttributeMap;
  readonly consistentRead?: boolean | undefined;
  readonly projectionExpression?: string | undefined;
  readonly expressionAttributeNames?: Readonly<Record<string, string>> | undefined;
}

/** Output for GetItem. */
export interface GetItemOutput {
  readonly item?: AttributeMap | undefined;
}

/** What a write returns of the item it touched. */
export type ReturnValues = "NONE" | "ALL_OLD" | "ALL_NEW" | "UPDATED_OLD" | "UPDATED_NEW";

/** Input for DeleteItem. */
export interface DeleteItemInput extends BaseOperationInput, ExpressionAttributes {
  readonly key: AttributeMap;
  readonly conditionExpression?: string | undefined;
  readonly returnValues?: ReturnValues | undefined;
}

/** Output for DeleteItem. */
export interface DeleteItemOutput {
  readonly attributes?: AttributeMap | undefined;
}

/** Input for UpdateItem. */
export interface UpdateItemInput extends BaseOperationInput, ExpressionAttributes {
  readonly key: AttributeMap;
  readonly updateExpression: string;
  readonly conditionExpression?: string | undefined;
  readonly returnValues?: ReturnValues | undefined;
}

/** Output for UpdateItem. */
export interface UpdateItemOutput {
  readonly attributes?: AttributeMap | undefined;
}

/** Input for Query. */
export interface QueryInput extends BaseOperationInput, ExpressionAttributes {
  readonly indexName?: string | undefined;
  readonly keyConditionExpression: string;
  readonly limit?: number | undefined;
  readonly exclusiveStartKey?: AttributeMap | undefined;
  readonly scanIndexForward?: boolean | undefined;
  readonly consistentRead?: boolean | undefined;
  readonly projectionExpression?: string | undefined;
}

/** Output for Query. */
export interface QueryOutput {
  readonly items: ReadonlyArray<AttributeMap>;
  readonly count: number;
  readonly lastEvaluatedKey?: AttributeMap | undefined;
}

/** A single put or delete inside a batch write. */
export type BatchWriteEntry =
  | { readonly type: "put"; readonly item: AttributeMap }
  | { readonly type: "delete"; readonly key: AttributeMap };

/** The writes of a batch addressed to one table. */
export interface BatchWriteRequest {
  readonly tableName: string;
  readonly requests: ReadonlyArray<BatchWriteEntry>;
}

/** Output for BatchWriteItem. */
export interface BatchWriteOutput {
  readonly unprocessedItems: ReadonlyArray<BatchWriteRequest>;
}

/** The reads of a batch addressed to one table. */
export interface BatchGetRequest {
  readonly tableName: string;
  readonly keys: ReadonlyArray<AttributeMap>;
  readonly consistentRead?: boolean | undefined;
  readonly projectionExpression?: string | undefined;
  readonly expressionAttributeNames?: Readonly<Record<string, string>> | undefined;
}

/** Output for BatchGetItem. */
export interface BatchGetOutput {
  readonly responses: Readonly<Record<string, ReadonlyArray<AttributeMap>>>;
  readonly unprocessedKeys: ReadonlyArray<BatchGetRequest>;
}

/**
 * The adapter interface that all SDK adapters must implement.
 *
 * This is a record of async functions, not a class.
 * Each function corresponds to a DynamoDB API operation, and failures
 * surface as rejected promises carrying the backend's exception.
 */
export interface SDKAdapter {
  readonly putItem: (input: PutItemInput) => Promise<PutItemOutput>;
  readonly getItem: (input: GetItemInput) => Promise<GetItemOutput>;
  readonly deleteItem: (input: DeleteItemInput) => Promise<DeleteItemOutput>;
  readonly updateItem: (input: UpdateItemInput) => Promise<UpdateItemOutput>;
  readonly query: (input: QueryInput) => Promise<QueryOutput>;
  readonly batchWriteItem: (
    requests: ReadonlyArray<BatchWriteRequest>,
  ) => Promise<BatchWriteOutput>;
  readonly batchGetItem: (
    requests: ReadonlyArray<BatchGetRequest>,
  ) => Promise<BatchGetOutput>;
}
