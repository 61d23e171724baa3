export type ParkingAction = 'ENTRY' | 'EXIT';

export const UNKNOWN_PLATE = 'UNKNOWN';

export type GateMessage =
    | 'IMAGE_DECODE_ERROR'
    | 'INVALID_ACTION'
    | 'FULL'
    | 'DENIED_NO_TEXT'
    | 'OPEN_GATE'
    | 'EXIT_SUCCESS'
    | 'INTERNAL_ERROR';

export interface GateResponse {
    statusCode: number;
    body: GateMessage;
}

/**
 * A single result from the text detection service. Confidence is on a 0-100 scale.
 */
export interface TextDetection {
    type: 'LINE' | 'WORD';
    confidence: number;
    text: string;
}

export interface SessionRecord {
    plate: string;
    entryEpoch: number;
    entryTimestamp: string;
    action: 'ENTRY';
    imageUrl: string;
}

export type MetricUnit = 'Count';

export interface MetricSample {
    name: string;
    value: number;
    unit: MetricUnit;
}
