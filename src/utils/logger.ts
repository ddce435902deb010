import * as winston from 'winston';

type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'SUCCESS';

const WINSTON_LEVELS: Record<LogLevel, string> = {
    INFO: 'info',
    WARN: 'warn',
    ERROR: 'error',
    DEBUG: 'debug',
    SUCCESS: 'info'
};

/**
 * Logger utility for the storage provider
 */
export class Logger {
    private static sink: winston.Logger | undefined;
    private static debugMode = false;
    private static silent = false;

    /**
     * Route output through a host-provided winston logger
     */
    public static use(logger: winston.Logger): void {
        this.sink = logger;
        this.applySilent();
    }

    public static setDebugMode(enabled: boolean): void {
        this.debugMode = enabled;
    }

    public static isDebugMode(): boolean {
        return this.debugMode;
    }

    public static setSilent(silent: boolean): void {
        this.silent = silent;
        this.applySilent();
    }

    public static info(message: string): void {
        this.log('INFO', message);
    }

    public static warn(message: string): void {
        this.log('WARN', message);
    }

    public static error(message: string, error?: Error): void {
        this.log('ERROR', message);
        if (error) {
            this.log('ERROR', error.stack || error.message);
        }
    }

    public static debug(message: string): void {
        if (this.debugMode) {
            this.log('DEBUG', message);
        }
    }

    public static success(message: string): void {
        this.log('SUCCESS', message);
    }

    private static getSink(): winston.Logger {
        if (!this.sink) {
            this.sink = winston.createLogger({
                level: 'debug',
                format: winston.format.printf(info => String(info.message)),
                transports: [
                    new winston.transports.Console({ stderrLevels: ['error'] })
                ]
            });
            this.applySilent();
        }
        return this.sink;
    }

    private static applySilent(): void {
        this.sink?.transports.forEach(transport => {
            transport.silent = this.silent;
        });
    }

    private static log(level: LogLevel, message: string): void {
        const timestamp = new Date().toISOString();
        const formattedMessage = `[${timestamp}] [${level}] ${message}`;
        this.getSink().log(WINSTON_LEVELS[level], formattedMessage);
    }
}
