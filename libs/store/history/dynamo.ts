import { ConditionalCheckFailedException, DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, GetCommand, PutCommand } from "@aws-sdk/lib-dynamodb";

import { validate } from "../../contracts/src/validate";
import type { CheckIn } from "../../validation/dto";
import { ValidationError } from "../../validation/errors";
import { KeyedMutex } from "../keyed-mutex";
import { HISTORY_CAPACITY, type SignalBuffer } from "./types";

const MAX_WRITE_ATTEMPTS = 3;

function keys(userId: string) {
    return { PK: `USER#${userId}`, SK: "HISTORY" };
}

function readCheckIns(raw: unknown): CheckIn[] {
    if (raw === undefined) return [];
    if (!Array.isArray(raw)) throw new ValidationError("stored history is not a list");
    return raw.map(entry => {
        validate<CheckIn>("check-in.v1", entry);
        return entry;
    });
}

export interface DynamoSignalBufferOptions {
    tableName: string;
    client?: DynamoDBDocumentClient;
    capacity?: number;
}

/**
 * One item per user holding the last N check-ins. Writes are serialized per user
 * in-process and guarded across processes by a version condition.
 */
export class DynamoSignalBuffer implements SignalBuffer {
    private readonly ddb: DynamoDBDocumentClient;
    private readonly tableName: string;
    private readonly capacity: number;
    private mutex = new KeyedMutex();

    constructor(opts: DynamoSignalBufferOptions) {
        this.tableName = opts.tableName;
        this.capacity = opts.capacity ?? HISTORY_CAPACITY;
        this.ddb = opts.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}), {
            marshallOptions: { removeUndefinedValues: true },
        });
    }

    private async load(userId: string): Promise<{ checkIns: CheckIn[]; version: number }> {
        const res = await this.ddb.send(new GetCommand({
            TableName: this.tableName,
            Key: keys(userId),
            ConsistentRead: true,
        }));
        const version = typeof res.Item?.version === "number" ? res.Item.version : 0;
        return { checkIns: readCheckIns(res.Item?.checkIns), version };
    }

    async record(userId: string, checkIn: CheckIn): Promise<void> {
        await this.mutex.runExclusive(userId, async () => {
            for (let attempt = 1; ; attempt++) {
                const { checkIns, version } = await this.load(userId);
                const next = [...checkIns, checkIn].slice(-this.capacity);
                try {
                    await this.ddb.send(new PutCommand({
                        TableName: this.tableName,
                        Item: { ...keys(userId), entityType: "history", checkIns: next, version: version + 1 },
                        ConditionExpression: "attribute_not_exists(PK) OR #ver = :ver",
                        ExpressionAttributeNames: { "#ver": "version" },
                        ExpressionAttributeValues: { ":ver": version },
                    }));
                    return;
                } catch (err) {
                    // Another process wrote between our read and write: re-read and re-apply.
                    if (err instanceof ConditionalCheckFailedException && attempt < MAX_WRITE_ATTEMPTS) continue;
                    throw err;
                }
            }
        });
    }

    async history(userId: string): Promise<readonly CheckIn[]> {
        const { checkIns } = await this.load(userId);
        return checkIns;
    }
}
