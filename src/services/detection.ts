import { DetectTextCommand, type RekognitionClient, type TextDetection as RekognitionDetection } from '@aws-sdk/client-rekognition';
import { UNKNOWN_PLATE, type TextDetection } from '../types';
import { RecognitionError, describeError } from '../utils/errors';
import { prepareForRecognition } from '../utils/image-processing';
import { logger, EMOJIS } from '../utils/logger';
import { ok, err, type Result } from '../utils/result';

export interface TextRecognizer {
    detectText(imageBuffer: Buffer): Promise<Result<TextDetection[], RecognitionError>>;
}

function toTextDetection(detection: RekognitionDetection): TextDetection | null {
    if (!detection.DetectedText || detection.Confidence === undefined) {
        return null;
    }
    if (detection.Type !== 'LINE' && detection.Type !== 'WORD') {
        return null;
    }
    return {
        type: detection.Type,
        confidence: detection.Confidence,
        text: detection.DetectedText,
    };
}

export class RekognitionTextRecognizer implements TextRecognizer {
    constructor(private client: RekognitionClient, private maxDimension: number) {}

    async detectText(imageBuffer: Buffer): Promise<Result<TextDetection[], RecognitionError>> {
        try {
            const prepared = await prepareForRecognition(imageBuffer, this.maxDimension);
            const response = await this.client.send(new DetectTextCommand({ Image: { Bytes: prepared } }));
            const detections = (response.TextDetections ?? [])
                .map(toTextDetection)
                .filter((d): d is TextDetection => d !== null);
            return ok(detections);
        } catch (error) {
            return err(new RecognitionError(`Text detection failed: ${describeError(error)}`, error));
        }
    }
}

/**
 * Picks the plate from the detections: the first full line whose confidence
 * is strictly above the threshold, or UNKNOWN.
 */
export function selectPlate(detections: TextDetection[], threshold: number): string {
    const lines = detections
        .filter(d => d.type === 'LINE' && d.confidence > threshold)
        .map(d => d.text);

    logger.info(`${EMOJIS.PLATE_DETECT} Plate read: [${lines.join(', ')}]`);
    return lines.length > 0 ? lines[0] : UNKNOWN_PLATE;
}

export async function recognizePlate(recognizer: TextRecognizer, imageBuffer: Buffer, threshold: number): Promise<string> {
    if (imageBuffer.length === 0) {
        logger.warn(`${EMOJIS.NO_PLATE} No image bytes, skipping text detection`);
        return UNKNOWN_PLATE;
    }

    const result = await recognizer.detectText(imageBuffer);
    if (!result.ok) {
        logger.error(`${EMOJIS.NO_PLATE} ${result.error.message}`);
        return UNKNOWN_PLATE;
    }

    return selectPlate(result.value, threshold);
}
