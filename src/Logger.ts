import * as fs from 'fs';

enum LogLevel {
    Debug = 'debug',
    Info = 'info',
    Warn = 'warn',
    Error = 'error',
    None = 'none'
}

enum LogOutput {
    Console = 'console',
    File = 'file',
    Both = 'both'
}

const isLogLevel = (value: string): value is LogLevel =>
    Object.values(LogLevel).some(level => level === value);

const isLogOutput = (value: string): value is LogOutput =>
    Object.values(LogOutput).some(output => output === value);

// Accepts either the enum key ("Debug") or its value ("debug")
const parseLogLevel = (value: string | null | undefined, fallback: LogLevel = LogLevel.Info): LogLevel => {
    if (!value) {
        return fallback;
    }
    const normalized = value.toLowerCase();
    return isLogLevel(normalized) ? normalized : fallback;
};

const parseLogOutput = (value: string | null | undefined, fallback: LogOutput = LogOutput.Console): LogOutput => {
    if (!value) {
        return fallback;
    }
    const normalized = value.toLowerCase();
    return isLogOutput(normalized) ? normalized : fallback;
};

const formatParam = (param: unknown): string => {
    if (param instanceof Error) {
        return `${param.name}: ${param.message}`;
    }
    if (Buffer.isBuffer(param)) {
        return param.toString('hex');
    }
    return String(param);
};

class Logger {
    level: LogLevel;
    output: LogOutput;
    logFilePath: string;
    private scope: string | null;

    constructor(level: LogLevel, output: LogOutput, logFilePath: string, scope: string | null = null) {
        this.level = level;
        this.output = output;
        this.logFilePath = logFilePath;
        this.scope = scope;
    }

    /**
     * Returns a logger sharing this one's level and destination that prefixes
     * every message with `[scope]`.
     */
    withScope(scope: string): Logger {
        const nested = this.scope ? `${this.scope} ${scope}` : scope;
        return new Logger(this.level, this.output, this.logFilePath, nested);
    }

    private shouldLog(level: LogLevel): boolean {
        if (this.level === LogLevel.None) {
            return false;
        }
        const levels = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];
        return levels.indexOf(level) >= levels.indexOf(this.level);
    }

    private logToFile(message: string) {
        fs.appendFile(this.logFilePath, message + '\n', err => {
            if (err) {
                console.error('Error writing to log file:', err);
            }
        });
    }

    private logMessage(level: LogLevel, message: string, optionalParams: unknown[]) {
        const prefix = this.scope ? `[${this.scope}] ` : '';
        const formattedMessage = `[${level.toUpperCase()}] ${new Date().toISOString()} - ${prefix}${message}`;

        if (this.output === LogOutput.Console || this.output === LogOutput.Both) {
            console.log(formattedMessage, ...optionalParams);
        }

        if (this.output === LogOutput.File || this.output === LogOutput.Both) {
            const params = optionalParams.map(formatParam).join(' ');
            this.logToFile(params ? `${formattedMessage} ${params}` : formattedMessage);
        }
    }

    debug(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog(LogLevel.Debug)) {
            this.logMessage(LogLevel.Debug, message, optionalParams);
        }
    }

    info(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog(LogLevel.Info)) {
            this.logMessage(LogLevel.Info, message, optionalParams);
        }
    }

    warn(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog(LogLevel.Warn)) {
            this.logMessage(LogLevel.Warn, message, optionalParams);
        }
    }

    error(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog(LogLevel.Error)) {
            this.logMessage(LogLevel.Error, message, optionalParams);
        }
    }
}

export { LogLevel, LogOutput, Logger, parseLogLevel, parseLogOutput };
