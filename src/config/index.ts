import { ConfigError } from '../utils/errors';

type Env = Record<string, string | undefined>;

export interface AppConfig {
    TABLE_NAME: string;
    LOGS_TABLE_NAME: string;
    BUCKET_NAME: string;
    REGION: string;
    LOT_ID: string;
    MAX_SPOTS: number;
    DEBUG_MODE: boolean;
    CONFIDENCE_THRESHOLD: number;
    OCR_MAX_DIMENSION: number;
    METRICS_NAMESPACE: string;
}

const NUMERIC_VARS = ['MAX_SPOTS', 'CONFIDENCE_THRESHOLD', 'OCR_MAX_DIMENSION'];

export function validateConfig(env: Env = process.env) {
    const problems: string[] = [];

    NUMERIC_VARS.forEach(varName => {
        const value = env[varName];
        if (value && isNaN(Number(value))) {
            problems.push(`Invalid numeric value for ${varName}: ${value}`);
        }
    });

    const maxSpots = Number(env.MAX_SPOTS || '30');
    if (!Number.isInteger(maxSpots) || maxSpots <= 0) {
        problems.push(`MAX_SPOTS must be a positive integer, got ${env.MAX_SPOTS}`);
    }

    const threshold = Number(env.CONFIDENCE_THRESHOLD || '70');
    if (threshold < 0 || threshold > 100) {
        problems.push(`CONFIDENCE_THRESHOLD must be between 0 and 100, got ${env.CONFIDENCE_THRESHOLD}`);
    }

    const maxDimension = Number(env.OCR_MAX_DIMENSION || '1920');
    if (!Number.isInteger(maxDimension) || maxDimension <= 0) {
        problems.push(`OCR_MAX_DIMENSION must be a positive integer, got ${env.OCR_MAX_DIMENSION}`);
    }

    if (problems.length > 0) {
        throw new ConfigError(problems.join('; '));
    }
}

export function loadConfig(env: Env = process.env): AppConfig {
    validateConfig(env);

    return {
        TABLE_NAME: env.TABLE_NAME || 'ParkingLot',
        LOGS_TABLE_NAME: env.LOGS_TABLE_NAME || 'ParkingLogs',
        BUCKET_NAME: env.BUCKET_NAME || 'parking-lot-images',
        REGION: env.AWS_REGION || 'ap-southeast-1',
        LOT_ID: env.LOT_ID || 'lot1',
        MAX_SPOTS: Number(env.MAX_SPOTS || '30'),
        DEBUG_MODE: env.DEBUG_MODE !== 'false',
        CONFIDENCE_THRESHOLD: Number(env.CONFIDENCE_THRESHOLD || '70'),
        OCR_MAX_DIMENSION: Number(env.OCR_MAX_DIMENSION || '1920'),
        METRICS_NAMESPACE: env.METRICS_NAMESPACE || 'SmartParking',
    };
}
