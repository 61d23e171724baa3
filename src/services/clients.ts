import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { RekognitionClient } from '@aws-sdk/client-rekognition';
import { S3Client } from '@aws-sdk/client-s3';
import type { AppConfig } from '../config';
import type { GateServices } from '../controllers/gateController';
import { systemClock } from '../utils/time';
import { RekognitionTextRecognizer } from './detection';
import { CloudWatchMetricsSink } from './metrics';
import { DynamoOccupancyStore } from './occupancy';
import { DynamoSessionStore } from './sessions';
import { S3ImageStore } from './storage';

/**
 * Builds the AWS-backed collaborators. Called once per process so warm
 * invocations reuse the same connections.
 */
export function createServices(config: AppConfig): GateServices {
    const region = config.REGION;
    const documents = DynamoDBDocumentClient.from(new DynamoDBClient({ region }));

    return {
        images: new S3ImageStore(new S3Client({ region }), config.BUCKET_NAME, region),
        recognizer: new RekognitionTextRecognizer(new RekognitionClient({ region }), config.OCR_MAX_DIMENSION),
        occupancy: new DynamoOccupancyStore(documents, config.TABLE_NAME, config.LOT_ID),
        sessions: new DynamoSessionStore(documents, config.LOGS_TABLE_NAME),
        metrics: new CloudWatchMetricsSink(new CloudWatchClient({ region })),
        clock: systemClock,
    };
}
