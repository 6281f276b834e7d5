import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { formatLogLine } from './logFormat';

const logsDir = process.env.BADGE_CI_LOG_DIR || path.join(process.cwd(), 'logs');

if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
}

const fileFormat = winston.format.printf(info => formatLogLine({
    timestamp: info.timestamp,
    level: info.level,
    message: info.message,
    stack: info.stack,
}, true));

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    // Shared by every transport: timestamp once, keep stacks of logged errors
    format: winston.format.combine(
        winston.format.errors({ stack: true }),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
    ),
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.printf(info => formatLogLine({
                    timestamp: info.timestamp,
                    level: info.level,
                    message: info.message,
                    stack: info.stack,
                }))
            ),
        }),
        // One file per day for every run, kept two weeks
        new DailyRotateFile({
            filename: path.join(logsDir, 'badge-ci-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles: '14d',
            format: fileFormat,
        }),
        new winston.transports.File({
            filename: path.join(logsDir, 'badge-ci-error.log'),
            level: 'error',
            format: fileFormat,
        }),
    ],
});

export default logger;
