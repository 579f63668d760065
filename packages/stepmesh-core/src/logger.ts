// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export enum LoggerLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

export interface ILogSink {
    write(level: LoggerLevel, message: string, ...optionalParams: unknown[]): void;
}

export const ConsoleSink: ILogSink = {
    write(level: LoggerLevel, message: string, ...optionalParams: unknown[]) {
        switch (level) {
            case LoggerLevel.DEBUG:
                console.debug(`[DEBUG] ${message}`, ...optionalParams);
                break;
            case LoggerLevel.INFO:
                console.info(`[INFO] ${message}`, ...optionalParams);
                break;
            case LoggerLevel.WARN:
                console.warn(`[WARN] ${message}`, ...optionalParams);
                break;
            case LoggerLevel.ERROR:
                console.error(`[ERROR] ${message}`, ...optionalParams);
                break;
        }
    },
};

/**
 * Process-wide logging facade. Messages below {@link Logger.level} are dropped before they
 * reach the sink.
 */
export class Logger {
    static level: LoggerLevel = LoggerLevel.INFO;
    static sink: ILogSink = ConsoleSink;

    static debug(message: string, ...optionalParams: unknown[]) {
        Logger.log(LoggerLevel.DEBUG, message, optionalParams);
    }

    static info(message: string, ...optionalParams: unknown[]) {
        Logger.log(LoggerLevel.INFO, message, optionalParams);
    }

    static warn(message: string, ...optionalParams: unknown[]) {
        Logger.log(LoggerLevel.WARN, message, optionalParams);
    }

    static error(message: string, ...optionalParams: unknown[]) {
        Logger.log(LoggerLevel.ERROR, message, optionalParams);
    }

    static isEnabled(level: LoggerLevel) {
        return level >= Logger.level && Logger.level !== LoggerLevel.SILENT;
    }

    private static log(level: LoggerLevel, message: string, optionalParams: unknown[]) {
        if (!Logger.isEnabled(level)) return;
        Logger.sink.write(level, message, ...optionalParams);
    }
}
