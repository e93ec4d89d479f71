import winston from 'winston';
import fs from 'fs';
import { LOG_DIR, LOG_FILE, ERROR_LOG_FILE } from '../config';

const silent = process.env.LOG_SILENT === '1';

// Ensure logs directory exists
if (!silent && !fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
}

// Define log format
const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
        return `${timestamp} [${level.toUpperCase()}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta, null, 2) : ''
            }`;
    })
);

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            logFormat
        ),
    }),
];

if (!silent) {
    transports.push(
        // File transport for all logs
        new winston.transports.File({
            filename: LOG_FILE,
            maxsize: 10485760, // 10MB
            maxFiles: 5,
        }),
        // Separate file for errors
        new winston.transports.File({
            filename: ERROR_LOG_FILE,
            level: 'error',
        }),
    );
}

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    silent,
    transports,
});

// Stream object for HTTP request logging
export const logStream = {
    write: (message: string) => {
        logger.info(message.trim());
    },
};

export default logger;
