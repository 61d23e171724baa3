import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { loadConfig, type AppConfig } from './config';
import { GateController } from './controllers/gateController';
import { createServices } from './services/clients';
import { logger, EMOJIS } from './utils/logger';

const CONFIG = loadConfig();

function logConfiguration(config: AppConfig) {
    logger.info(`${EMOJIS.INIT} Application configuration:`);
    logger.info(`${EMOJIS.INIT} ----------------------------------------`);
    logger.info(`${EMOJIS.INIT} Region: ${config.REGION}`);
    logger.info(`${EMOJIS.INIT} Lot: ${config.LOT_ID} (${config.MAX_SPOTS} spots)`);
    logger.info(`${EMOJIS.INIT} Occupancy Table: ${config.TABLE_NAME}`);
    logger.info(`${EMOJIS.INIT} Logs Table: ${config.LOGS_TABLE_NAME}`);
    logger.info(`${EMOJIS.INIT} Image Bucket: ${config.BUCKET_NAME}`);
    logger.info(`${EMOJIS.INIT} Debug Mode: ${config.DEBUG_MODE ? 'Enabled' : 'Disabled'}`);
    logger.info(`${EMOJIS.INIT} Confidence Threshold: ${config.CONFIDENCE_THRESHOLD}`);
    logger.info(`${EMOJIS.INIT} Metrics Namespace: ${config.METRICS_NAMESPACE}`);
    logger.info(`${EMOJIS.INIT} ----------------------------------------`);
}

logConfiguration(CONFIG);

// Created at cold start and reused by every warm invocation.
const controller = new GateController(createServices(CONFIG), CONFIG);

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
    return controller.handle(event);
}
