import pino, { Logger } from 'pino';
import { CONFIG } from './config';

export type { Logger };

export interface LoggerOptions {
    level?: string;
    // Extra JSON log destination, next to the pretty terminal output
    file?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const level = options.level ?? CONFIG.LOG_LEVEL;
    const targets: pino.TransportTargetOptions[] = [
        {
            target: 'pino-pretty',
            level,
            options: { colorize: true, destination: 2 },
        },
    ];
    if (options.file) {
        targets.push({
            target: 'pino/file',
            level,
            options: { destination: options.file, mkdir: true },
        });
    }
    return pino({ level }, pino.transport({ targets }));
}
