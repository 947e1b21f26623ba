import {mkdirpSync} from "mkdirp";
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';

export type Logger = winston.Logger;

export interface LoggerOptions {
    logsFolder?: string;
    level?: string;
    console?: boolean;
}

// one logger per process, created by the entry point and handed to each stage
export function createLogger(options: LoggerOptions = {}): Logger {
    const logsFolder = options.logsFolder ?? './logs';
    const level = options.level ?? 'info';

    mkdirpSync(logsFolder);

    const fileTransports = [
        new DailyRotateFile({
            level: level,
            filename: path.join(logsFolder, 'json-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            handleExceptions: true,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json(),
            )
        }),
        new DailyRotateFile({
            level: level,
            filename: path.join(logsFolder, 'simple-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            handleExceptions: true,
            format: winston.format.combine(
                winston.format.timestamp({format: 'YYYY-MM-DD HH:mm:ss'}),
                winston.format.printf(info => `${info.timestamp} - ${info.level.toUpperCase()} - ${info.message}`)
            )
        })
    ];

    if (options.console === false) {
        return winston.createLogger({transports: fileTransports});
    }

    return winston.createLogger({
        transports: [
            ...fileTransports,
            new winston.transports.Console({
                level: level,
                handleExceptions: true,
                format: winston.format.combine(
                    winston.format.timestamp({format: 'YYYY-MM-DD HH:mm:ss'}),
                    winston.format.printf(info => `${info.timestamp} ${info.level}: ${info.message}`)
                )
            })
        ]
    });
}

// for tests and dry library use
export function createSilentLogger(): Logger {
    return winston.createLogger({
        silent: true,
        transports: [new winston.transports.Console()]
    });
}
