import winston from 'winston';
import chalk from 'chalk';
import * as path from 'path';

const customFormat = winston.format.printf(({ level, message, timestamp, stack }) => {
    let emoji = '';
    let color = chalk.white;

    switch (level) {
        case 'info':
            emoji = 'ℹ️';
            color = chalk.blue;
            break;
        case 'warn':
            emoji = '⚠️';
            color = chalk.yellow;
            break;
        case 'error':
            emoji = '❌';
            color = chalk.red;
            break;
        case 'debug':
            emoji = '🐛';
            color = chalk.green;
            break;
        default:
            emoji = '🔍';
            break;
    }

    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${color(`${emoji} [${timestamp}] ${level.toUpperCase()}:`)} ${message}${trace}`;
});

const logDir = process.env.LOG_DIR;

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.LOG_SILENT === 'true',
    format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        customFormat
    ),
    // Lambda only allows writes under /tmp, so file output is opt-in.
    transports: [
        new winston.transports.Console(),
        ...(logDir ? [
            new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }),
            new winston.transports.File({ filename: path.join(logDir, 'app.log') }),
        ] : []),
    ],
});

export const EMOJIS = {
    INIT: '🚀',
    REQUEST: '📨',
    IMAGE_STORE: '🖼️',
    PLATE_DETECT: '🚘',
    NO_PLATE: '🚫',
    GATE_OPEN: '🟢',
    GATE_CLOSED: '⛔',
    VEHICLE_EXIT: '🚗',
    OCCUPANCY: '🅿️',
    METRICS: '📊',
    DEBUG: '🐞',
};
