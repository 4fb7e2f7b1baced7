/**
 * 日志级别
 * EN: Log levels
 */
export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
}

export type LogContext = Record<string, unknown>;

export function formatLogLine(
    timestamp: Date,
    level: LogLevel,
    name: string,
    message: string,
    context?: LogContext
): string {
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp.toISOString()}] ${LogLevel[level].toUpperCase()} [${name}] ${message}${contextStr}`;
}

/**
 * 控制台日志器
 * 未设置级别的子日志器跟随父级别，因此可以在模块加载时创建
 * EN: Console logger
 * EN: A child without its own level follows its parent, so children can be created at module load
 */
export class ConsoleLogger {
    readonly name: string;
    private ownLevel: LogLevel | undefined;
    private readonly parent: ConsoleLogger | undefined;

    constructor(name: string, level?: LogLevel, parent?: ConsoleLogger) {
        this.name = name;
        this.ownLevel = level;
        this.parent = parent;
    }

    get level(): LogLevel {
        return this.ownLevel ?? this.parent?.level ?? LogLevel.Info;
    }

    isEnabled(level: LogLevel): boolean {
        return level >= this.level;
    }

    debug(message: string, context?: LogContext): void {
        if (this.isEnabled(LogLevel.Debug)) {
            console.debug(formatLogLine(new Date(), LogLevel.Debug, this.name, message, context));
        }
    }

    /**
     * 创建名为 `父名称.子名称` 的子日志器
     * EN: Create a child logger named `parent.child`
     */
    child(name: string): ConsoleLogger {
        return new ConsoleLogger(`${this.name}.${name}`, undefined, this);
    }

    setLevel(level: LogLevel): void {
        this.ownLevel = level;
    }
}

/**
 * 全局日志器
 * EN: Global logger
 */
export const logger = new ConsoleLogger('bson', LogLevel.Info);
