import type { APIGatewayProxyEvent, APIGatewayProxyEventHeaders } from 'aws-lambda';
import type { ParkingAction } from '../types';
import { ImageDecodeError } from '../utils/errors';
import { logger, EMOJIS } from '../utils/logger';

export const ACTION_HEADER = 'x-parking-action';
export const DEFAULT_ACTION = 'ENTRY';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export type InboundRequest = Pick<APIGatewayProxyEvent, 'headers' | 'body' | 'isBase64Encoded'>;

/**
 * Reads the action header regardless of how the client or gateway cased it.
 * The value itself is returned untouched.
 */
export function readAction(headers: APIGatewayProxyEventHeaders | null | undefined): string {
    if (!headers) {
        return DEFAULT_ACTION;
    }
    for (const [name, value] of Object.entries(headers)) {
        if (name.toLowerCase() === ACTION_HEADER && value !== undefined) {
            return value;
        }
    }
    return DEFAULT_ACTION;
}

export function parseAction(raw: string): ParkingAction | null {
    return raw === 'ENTRY' || raw === 'EXIT' ? raw : null;
}

/**
 * Decodes the request body as base64. `isBase64Encoded` is logged but does
 * not change the decoding: the gateway sends a base64 body either way.
 */
export function decodeImage(request: InboundRequest): Buffer {
    logger.debug(`${EMOJIS.DEBUG} isBase64Encoded=${request.isBase64Encoded}`);

    if (typeof request.body !== 'string') {
        throw new ImageDecodeError('Request has no body');
    }

    const compact = request.body.replace(/\s+/g, '');
    if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
        throw new ImageDecodeError(`Body is not valid base64 (${compact.length} characters)`);
    }

    return Buffer.from(compact, 'base64');
}
