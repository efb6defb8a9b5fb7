import fs from 'fs';
import path from 'path';
import { Request, Response } from 'express';
import { config, LogLevel } from '../config/app';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

interface RequestInfo {
    method: string;
    path: string;
    status: number;
    responseTime: number;
    userAgent?: string;
    ip?: string;
}

interface LoggerOptions {
    directory: string;
    level: LogLevel;
    toFile: boolean;
}

// Error 的属性不可枚举，序列化前先展开
function serializeMeta(meta: unknown): unknown {
    if (meta instanceof Error) {
        return { name: meta.name, message: meta.message, stack: meta.stack };
    }
    return meta;
}

export class Logger {
    private logFile: string;
    private minLevel: LogLevel;
    private toFile: boolean;

    constructor(private options: LoggerOptions) {
        this.logFile = path.join(options.directory, 'app.log');
        this.minLevel = options.level;
        this.toFile = options.toFile;

        // 确保日志目录存在
        if (this.toFile) {
            this.ensureLogDir();
        }
    }

    private ensureLogDir(): void {
        if (!fs.existsSync(this.options.directory)) {
            fs.mkdirSync(this.options.directory, { recursive: true });
        }
    }

    private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
        const timestamp = new Date().toISOString();
        let logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

        if (meta !== undefined) {
            try {
                logMessage += ` ${JSON.stringify(serializeMeta(meta))}`;
            } catch (error) {
                logMessage += ` [Meta serialization failed: ${String(error)}]`;
            }
        }

        return logMessage;
    }

    // 写文件失败只输出到控制台，不向调用方抛出
    private writeToFile(message: string): void {
        try {
            fs.appendFileSync(this.logFile, message + '\n');
        } catch (error) {
            console.error(`[Logger] 日志写入失败: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    private write(level: LogLevel, message: string, meta?: unknown): void {
        if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.minLevel]) {
            return;
        }

        const formattedMessage = this.formatMessage(level, message, meta);
        switch (level) {
            case 'debug':
                console.debug(formattedMessage);
                break;
            case 'info':
                console.info(formattedMessage);
                break;
            case 'warn':
                console.warn(formattedMessage);
                break;
            case 'error':
                console.error(formattedMessage);
                break;
        }

        if (this.toFile) {
            this.writeToFile(formattedMessage);
        }
    }

    debug(message: string, meta?: unknown): void {
        this.write('debug', message, meta);
    }

    info(message: string, meta?: unknown): void {
        this.write('info', message, meta);
    }

    warn(message: string, meta?: unknown): void {
        this.write('warn', message, meta);
    }

    error(message: string, meta?: unknown): void {
        this.write('error', message, meta);
    }

    // 用于记录API请求信息
    logRequest(req: Request, res: Response, responseTime: number): void {
        const logData: RequestInfo = {
            method: req.method,
            path: req.path,
            status: res.statusCode,
            responseTime,
            userAgent: req.headers['user-agent'],
            ip: req.ip || req.socket.remoteAddress
        };

        this.info(`HTTP ${req.method} ${req.path} ${res.statusCode}`, logData);
    }
}

// 导出单例
export const logger = new Logger(config.logging);
