import { GetCommand, PutCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { SessionRecord } from '../types';
import { StoreError, describeError } from '../utils/errors';
import { ok, err, type Result } from '../utils/result';

export interface SessionStore {
    /** Writes the record for the plate, replacing any earlier visit. */
    put(record: SessionRecord): Promise<Result<void, StoreError>>;
    get(plate: string): Promise<Result<SessionRecord | undefined, StoreError>>;
}

export function toSessionItem(record: SessionRecord): Record<string, string | number> {
    return {
        log_id: record.plate,
        timestamp: record.entryTimestamp,
        entry_epoch: record.entryEpoch,
        action: record.action,
        image_url: record.imageUrl,
    };
}

/**
 * Maps a logs table item back to a session. Returns undefined when the item
 * lacks a numeric entry_epoch, since no duration can be derived from it.
 */
export function parseSessionItem(item: Record<string, unknown>): SessionRecord | undefined {
    const { log_id, timestamp, entry_epoch, image_url } = item;
    if (typeof log_id !== 'string' || typeof entry_epoch !== 'number') {
        return undefined;
    }
    return {
        plate: log_id,
        entryEpoch: entry_epoch,
        entryTimestamp: typeof timestamp === 'string' ? timestamp : '',
        action: 'ENTRY',
        imageUrl: typeof image_url === 'string' ? image_url : '',
    };
}

export class DynamoSessionStore implements SessionStore {
    constructor(private client: DynamoDBDocumentClient, private table: string) {}

    async put(record: SessionRecord): Promise<Result<void, StoreError>> {
        try {
            await this.client.send(new PutCommand({ TableName: this.table, Item: toSessionItem(record) }));
            return ok(undefined);
        } catch (error) {
            return err(new StoreError(`Writing session for ${record.plate} failed: ${describeError(error)}`, error));
        }
    }

    async get(plate: string): Promise<Result<SessionRecord | undefined, StoreError>> {
        try {
            const response = await this.client.send(new GetCommand({ TableName: this.table, Key: { log_id: plate } }));
            if (!response.Item) {
                return ok(undefined);
            }
            const record = parseSessionItem(response.Item);
            if (!record) {
                return err(new StoreError(`Session item for ${plate} has no usable entry_epoch`));
            }
            return ok(record);
        } catch (error) {
            return err(new StoreError(`Reading session for ${plate} failed: ${describeError(error)}`, error));
        }
    }
}
