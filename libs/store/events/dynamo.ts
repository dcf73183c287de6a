import { ConditionalCheckFailedException, DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, PutCommand, QueryCommand } from "@aws-sdk/lib-dynamodb";

import { validate } from "../../contracts/src/validate";
import type { CanonicalEvent } from "../../validation/dto";
import { GLOBAL_SCOPE, dedupKey, type EventStore } from "./types";

/*
 * Single-table layout:
 *   PK = SCOPE#<scope>
 *   SK = EVENT#<iso timestamp>#<signal>#<value|->
 * ISO timestamps are fixed-width, so SK order is time order and the dedup key is the item key.
 */
function keys(event: CanonicalEvent, scope: string) {
    return { PK: `SCOPE#${scope}`, SK: `EVENT#${dedupKey(event)}` };
}

export interface DynamoEventStoreOptions {
    tableName: string;
    client?: DynamoDBDocumentClient;
}

export class DynamoEventStore implements EventStore {
    private readonly ddb: DynamoDBDocumentClient;
    private readonly tableName: string;

    constructor(opts: DynamoEventStoreOptions) {
        this.tableName = opts.tableName;
        this.ddb = opts.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}), {
            marshallOptions: { removeUndefinedValues: true },
        });
    }

    async append(event: CanonicalEvent, scope = GLOBAL_SCOPE): Promise<boolean> {
        try {
            await this.ddb.send(new PutCommand({
                TableName: this.tableName,
                Item: { ...keys(event, scope), entityType: "event", ...event },
                ConditionExpression: "attribute_not_exists(PK)",
            }));
            return true;
        } catch (err) {
            if (err instanceof ConditionalCheckFailedException) return false;
            throw err;
        }
    }

    async query(since: Date, until: Date, scope = GLOBAL_SCOPE): Promise<CanonicalEvent[]> {
        if (since.getTime() >= until.getTime()) return [];
        const out: CanonicalEvent[] = [];
        let startKey: Record<string, unknown> | undefined;
        do {
            const res = await this.ddb.send(new QueryCommand({
                TableName: this.tableName,
                // `EVENT#<until>` sorts before every SK stamped exactly at `until`, so BETWEEN is half-open here
                KeyConditionExpression: "PK = :pk AND SK BETWEEN :lo AND :hi",
                ExpressionAttributeValues: {
                    ":pk": `SCOPE#${scope}`,
                    ":lo": `EVENT#${since.toISOString()}`,
                    ":hi": `EVENT#${until.toISOString()}`,
                },
                ExclusiveStartKey: startKey,
                ScanIndexForward: true, // ascending by timestamp
            }));
            for (const item of res.Items ?? []) {
                const { PK, SK, entityType, ...event } = item;
                validate<CanonicalEvent>("canonical-event.v1", event);
                out.push(event);
            }
            startKey = res.LastEvaluatedKey;
        } while (startKey);
        return out;
    }
}
