import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import {
    GetCommand,
    PutCommand,
    UpdateCommand,
    type DynamoDBDocumentClient,
    type GetCommandInput,
    type PutCommandInput,
    type UpdateCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { StoreError, describeError } from '../utils/errors';
import { ok, err, type Result } from '../utils/result';

/**
 * The lot's free-space counter. Every mutation is an atomic delta applied by
 * the store and returns the stored value after the update.
 */
export interface OccupancyStore {
    getAvailableSlots(): Promise<Result<number | undefined, StoreError>>;
    initialise(slots: number): Promise<Result<void, StoreError>>;
    /** Resolves to null when the lot had no free slot left at write time. */
    decrement(): Promise<Result<number | null, StoreError>>;
    increment(): Promise<Result<number, StoreError>>;
}

export function buildReadInput(table: string, lotId: string): GetCommandInput {
    return {
        TableName: table,
        Key: { lot_id: lotId },
        ConsistentRead: true,
    };
}

export function buildInitialiseInput(table: string, lotId: string, slots: number): PutCommandInput {
    return {
        TableName: table,
        Item: { lot_id: lotId, available_slots: slots },
        ConditionExpression: 'attribute_not_exists(lot_id)',
    };
}

export function buildDecrementInput(table: string, lotId: string): UpdateCommandInput {
    return {
        TableName: table,
        Key: { lot_id: lotId },
        UpdateExpression: 'SET available_slots = available_slots - :one',
        ConditionExpression: 'available_slots > :zero',
        ExpressionAttributeValues: { ':one': 1, ':zero': 0 },
        ReturnValues: 'UPDATED_NEW',
    };
}

export function buildIncrementInput(table: string, lotId: string): UpdateCommandInput {
    return {
        TableName: table,
        Key: { lot_id: lotId },
        UpdateExpression: 'SET available_slots = available_slots + :one',
        ConditionExpression: 'attribute_exists(lot_id)',
        ExpressionAttributeValues: { ':one': 1 },
        ReturnValues: 'UPDATED_NEW',
    };
}

function readSlots(attributes: Record<string, unknown> | undefined): number | undefined {
    const value = attributes?.available_slots;
    return typeof value === 'number' ? value : undefined;
}

export class DynamoOccupancyStore implements OccupancyStore {
    constructor(private client: DynamoDBDocumentClient, private table: string, private lotId: string) {}

    async getAvailableSlots(): Promise<Result<number | undefined, StoreError>> {
        try {
            const response = await this.client.send(new GetCommand(buildReadInput(this.table, this.lotId)));
            return ok(readSlots(response.Item));
        } catch (error) {
            return err(new StoreError(`Reading occupancy for ${this.lotId} failed: ${describeError(error)}`, error));
        }
    }

    async initialise(slots: number): Promise<Result<void, StoreError>> {
        try {
            await this.client.send(new PutCommand(buildInitialiseInput(this.table, this.lotId, slots)));
            return ok(undefined);
        } catch (error) {
            // Another request created the counter first.
            if (error instanceof ConditionalCheckFailedException) {
                return ok(undefined);
            }
            return err(new StoreError(`Initialising occupancy for ${this.lotId} failed: ${describeError(error)}`, error));
        }
    }

    async decrement(): Promise<Result<number | null, StoreError>> {
        try {
            const response = await this.client.send(new UpdateCommand(buildDecrementInput(this.table, this.lotId)));
            return this.updatedSlots(response.Attributes);
        } catch (error) {
            if (error instanceof ConditionalCheckFailedException) {
                return ok(null);
            }
            return err(new StoreError(`Decrementing occupancy for ${this.lotId} failed: ${describeError(error)}`, error));
        }
    }

    async increment(): Promise<Result<number, StoreError>> {
        try {
            const response = await this.client.send(new UpdateCommand(buildIncrementInput(this.table, this.lotId)));
            return this.updatedSlots(response.Attributes);
        } catch (error) {
            return err(new StoreError(`Incrementing occupancy for ${this.lotId} failed: ${describeError(error)}`, error));
        }
    }

    private updatedSlots(attributes: Record<string, unknown> | undefined): Result<number, StoreError> {
        const slots = readSlots(attributes);
        if (slots === undefined) {
            return err(new StoreError(`Update for ${this.lotId} returned no available_slots`));
        }
        return ok(slots);
    }
}
