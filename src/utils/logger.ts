import winston from 'winston';

// Every level goes to stderr; stdout carries the device's own output.
const STDERR_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export const createLogger = (level: string = 'info', label?: string): winston.Logger => {
    return winston.createLogger({
        level,
        format: winston.format.combine(
            winston.format.label({ label: label || 'devbench' }),
            winston.format.timestamp(),
            winston.format.printf(({ timestamp, level, label, message, ...meta }) =>
                `${timestamp} [${label}] ${level}: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`.trimEnd()
            )
        ),
        transports: [new winston.transports.Console({ stderrLevels: STDERR_LEVELS })],
    });
};
