import type { AppConfig } from '../config';
import { recognizePlate, type TextRecognizer } from '../services/detection';
import { emitMetrics, type MetricsSink } from '../services/metrics';
import type { OccupancyStore } from '../services/occupancy';
import { decodeImage, parseAction, readAction, type InboundRequest } from '../services/request';
import type { SessionStore } from '../services/sessions';
import { buildImageKey, FALLBACK_IMAGE_KEY, type ImageStore } from '../services/storage';
import { UNKNOWN_PLATE, type GateMessage, type GateResponse, type ParkingAction } from '../types';
import { DurationLookupError, ImageDecodeError, type StoreError } from '../utils/errors';
import { logger, EMOJIS } from '../utils/logger';
import { formatTimestamp, toEpochSeconds, type Clock } from '../utils/time';

export interface GateServices {
    images: ImageStore;
    recognizer: TextRecognizer;
    occupancy: OccupancyStore;
    sessions: SessionStore;
    metrics: MetricsSink;
    clock: Clock;
}

export type GateConfig = Pick<
    AppConfig,
    'MAX_SPOTS' | 'DEBUG_MODE' | 'CONFIDENCE_THRESHOLD' | 'METRICS_NAMESPACE'
>;

function respond(statusCode: number, body: GateMessage): GateResponse {
    return { statusCode, body };
}

function storeFailure(error: StoreError): GateResponse {
    logger.error(`${EMOJIS.OCCUPANCY} ${error.message}`);
    return respond(500, 'INTERNAL_ERROR');
}

/** Whole minutes between entry and exit; never negative. */
export function computeDurationMinutes(entryEpoch: number, exitEpoch: number): number {
    return Math.max(0, Math.floor((exitEpoch - entryEpoch) / 60));
}

/**
 * Runs one barrier event end to end: decode the capture, keep a debug copy,
 * read the plate, then apply the ENTRY or EXIT transition.
 */
export class GateController {
    constructor(private services: GateServices, private config: GateConfig) {}

    async handle(request: InboundRequest): Promise<GateResponse> {
        const rawAction = readAction(request.headers);
        logger.info(`${EMOJIS.REQUEST} Action detected: ${rawAction}`);

        let image: Buffer;
        try {
            image = decodeImage(request);
        } catch (error) {
            if (error instanceof ImageDecodeError) {
                logger.error(`${EMOJIS.NO_PLATE} Decoding error: ${error.message}`);
                return respond(400, 'IMAGE_DECODE_ERROR');
            }
            throw error;
        }

        const action = parseAction(rawAction);
        if (!action) {
            logger.warn(`${EMOJIS.GATE_CLOSED} Rejecting unknown action "${rawAction}"`);
            return respond(400, 'INVALID_ACTION');
        }

        const imageKey = await this.storeDebugImage(action, image);
        const plate = await recognizePlate(this.services.recognizer, image, this.config.CONFIDENCE_THRESHOLD);

        return action === 'ENTRY'
            ? this.handleEntry(plate, imageKey)
            : this.handleExit(plate);
    }

    async handleEntry(plate: string, imageKey: string): Promise<GateResponse> {
        const { occupancy, sessions, images, clock } = this.services;

        const current = await occupancy.getAvailableSlots();
        if (!current.ok) {
            return storeFailure(current.error);
        }

        let slots = current.value;
        if (slots === undefined) {
            const created = await occupancy.initialise(this.config.MAX_SPOTS);
            if (!created.ok) {
                return storeFailure(created.error);
            }
            logger.info(`${EMOJIS.INIT} Initialised lot with ${this.config.MAX_SPOTS} slots`);
            slots = this.config.MAX_SPOTS;
        }

        if (slots <= 0) {
            logger.info(`${EMOJIS.GATE_CLOSED} Lot is full`);
            return respond(200, 'FULL');
        }

        if (plate === UNKNOWN_PLATE) {
            logger.info(`${EMOJIS.NO_PLATE} Entry denied, no plate text`);
            return respond(200, 'DENIED_NO_TEXT');
        }

        const decremented = await occupancy.decrement();
        if (!decremented.ok) {
            return storeFailure(decremented.error);
        }
        if (decremented.value === null) {
            logger.info(`${EMOJIS.GATE_CLOSED} Last slot was taken before ${plate} could enter`);
            return respond(200, 'FULL');
        }

        const now = clock();
        const written = await sessions.put({
            plate,
            entryEpoch: toEpochSeconds(now),
            entryTimestamp: formatTimestamp(now),
            action: 'ENTRY',
            imageUrl: images.urlFor(imageKey),
        });
        if (!written.ok) {
            // Give the slot back; the car was not let in.
            const released = await occupancy.increment();
            if (!released.ok) {
                logger.error(`${EMOJIS.OCCUPANCY} Could not release slot after failed entry of ${plate}: ${released.error.message}`);
            }
            return storeFailure(written.error);
        }

        await emitMetrics(this.services.metrics, this.config.METRICS_NAMESPACE, 'ENTRY', decremented.value, 0);

        logger.info(`${EMOJIS.GATE_OPEN} ${plate} entered, ${decremented.value} slots left`);
        return respond(200, 'OPEN_GATE');
    }

    async handleExit(plate: string): Promise<GateResponse> {
        const incremented = await this.services.occupancy.increment();
        if (!incremented.ok) {
            return storeFailure(incremented.error);
        }

        const slots = incremented.value;
        if (slots > this.config.MAX_SPOTS) {
            logger.warn(`${EMOJIS.OCCUPANCY} Available slots (${slots}) now exceed capacity (${this.config.MAX_SPOTS})`);
        }

        let durationMinutes = 0;
        if (plate !== UNKNOWN_PLATE) {
            durationMinutes = await this.lookupDurationMinutes(plate);
        }

        await emitMetrics(this.services.metrics, this.config.METRICS_NAMESPACE, 'EXIT', slots, durationMinutes);

        logger.info(`${EMOJIS.VEHICLE_EXIT} ${plate} exited, ${slots} slots available`);
        return respond(200, 'EXIT_SUCCESS');
    }

    private async lookupDurationMinutes(plate: string): Promise<number> {
        const session = await this.services.sessions.get(plate);
        if (!session.ok) {
            const failure = new DurationLookupError(`Duration calculation failed for ${plate}`, session.error);
            logger.warn(`${EMOJIS.VEHICLE_EXIT} ${failure.message}: ${session.error.message}`);
            return 0;
        }
        if (!session.value) {
            logger.info(`${EMOJIS.VEHICLE_EXIT} No entry record for ${plate}`);
            return 0;
        }

        const exitEpoch = toEpochSeconds(this.services.clock());
        const minutes = computeDurationMinutes(session.value.entryEpoch, exitEpoch);
        logger.info(`${EMOJIS.VEHICLE_EXIT} Car ${plate} stayed for ${minutes} minutes.`);
        return minutes;
    }

    private async storeDebugImage(action: ParkingAction, image: Buffer): Promise<string> {
        if (!this.config.DEBUG_MODE || image.length === 0) {
            return FALLBACK_IMAGE_KEY;
        }

        const key = buildImageKey(action, toEpochSeconds(this.services.clock()));
        const stored = await this.services.images.put(key, image);
        if (!stored.ok) {
            logger.error(`${EMOJIS.IMAGE_STORE} S3 upload error: ${stored.error.message}`);
        } else {
            logger.debug(`${EMOJIS.IMAGE_STORE} Stored capture as ${key}`);
        }
        return key;
    }
}
