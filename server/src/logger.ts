import winston, { Logger } from 'winston';
import config from './config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

let logger: Logger;

// Tests still see calls through spies, nothing reaches the console
const silent = config.nodeEnv === 'test';

if (config.nodeEnv === 'production') {
    logger = winston.createLogger({
        level: config.logLevel,
        silent,
        format: combine(
            timestamp(),
            errors({ stack: true }), // Include stack traces for errors
            winston.format.json(), // One JSON object per line for log collectors
        ),
        transports: [
            new winston.transports.Console(),
        ],
    });
} else {
    // Human-readable lines for local runs
    const consoleFormat = combine(
        colorize(), // Add colors to the log level
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        printf(({ level, message, timestamp, stack }) => {
            // Append the stack when an error was logged
            if (stack) {
                return `${timestamp} ${level}: ${message} - ${stack}`;
            }
            return `${timestamp} ${level}: ${message}`;
        })
    );
    logger = winston.createLogger({
        level: config.logLevel,
        silent,
        format: combine(
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            errors({ stack: true }),
            winston.format.json(),
        ),
        transports: [
            new winston.transports.Console({
                level: config.logLevel, // LOG_LEVEL=debug shows every card played
                format: consoleFormat,
            }),
        ],
    });
}

export default logger;
