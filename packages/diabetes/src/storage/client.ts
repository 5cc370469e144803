/**
 * DynamoDB client configuration
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

/**
 * Create a DynamoDB Document Client.
 * Region comes from AWS_REGION (set by the Lambda runtime),
 * falling back to us-east-1 for local use.
 */
export function createDocClient(region: string = process.env.AWS_REGION ?? "us-east-1"): DynamoDBDocumentClient {
  const client = new DynamoDBClient({ region });
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
    },
  });
}
