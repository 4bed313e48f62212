import { config } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
};

const levelColors: Record<LogLevel, string> = {
    debug: colors.dim,
    info: colors.green,
    warn: colors.yellow,
    error: colors.red,
};

const levelRank: Record<LogLevel | 'silent', number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isLevelName(level: string): level is LogLevel | 'silent' {
    return Object.prototype.hasOwnProperty.call(levelRank, level);
}

function thresholdFor(level: string): number {
    return isLevelName(level) ? levelRank[level] : levelRank.info;
}

class Logger {
    private context: string;
    private threshold: number;

    constructor(context: string = 'App', level: string = config.log.level) {
        this.context = context;
        this.threshold = thresholdFor(level);
    }

    private log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (levelRank[level] < this.threshold) return;

        const timestamp = new Date().toISOString();
        const color = levelColors[level];
        const write = level === 'error' ? console.error : console.log;

        write(
            `${colors.dim}${timestamp}${colors.reset} ${color}[${level.toUpperCase()}]${colors.reset} ${colors.cyan}[${this.context}]${colors.reset} ${message}`,
            ...args
        );
    }

    debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this.log('info', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this.log('error', message, ...args);
    }

    isEnabled(level: LogLevel): boolean {
        return levelRank[level] >= this.threshold;
    }

    child(context: string): Logger {
        const child = new Logger(`${this.context}:${context}`);
        child.threshold = this.threshold;
        return child;
    }
}

export const logger = new Logger('AMM');
export { Logger };
export type { LogLevel };
