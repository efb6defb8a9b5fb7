import { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { config } from '../config/app';
import { createErrorResponse, ErrorCode, ErrorCodes } from '../utils/apiResponse';
import { logger } from '../utils/logger';

/**
 * 自定义错误类，用于应用程序中抛出操作性错误
 */
export class ApplicationError extends Error {
    statusCode: number;
    code: ErrorCode;
    details?: unknown;
    isOperational: boolean;

    constructor(code: ErrorCode, message: string, statusCode: number = 400, details?: unknown) {
        super(message);
        this.name = 'ApplicationError';
        this.statusCode = statusCode;
        this.code = code;
        this.details = details;
        this.isOperational = true; // 这是一个可控制的业务错误

        // 设置原型链，以便错误实例正确地被instanceof检测
        Object.setPrototypeOf(this, ApplicationError.prototype);
    }
}

/**
 * 捕获异步路由处理器中的错误
 */
export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
    (req, res, next) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };

/**
 * 处理404错误（未找到路由）
 */
export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
    next(new ApplicationError(
        ErrorCodes.NOT_FOUND,
        `未找到路径: ${req.originalUrl}`,
        404
    ));
};

/**
 * 将任意错误转换为应用错误
 */
export function toApplicationError(err: unknown): ApplicationError {
    if (err instanceof ApplicationError) {
        return err;
    }

    if (err instanceof multer.MulterError) {
        if (err.code === 'LIMIT_FILE_SIZE') {
            return new ApplicationError(
                ErrorCodes.FILE_TOO_LARGE,
                `文件大小超出限制，最大支持${config.upload.maxFileSize / (1024 * 1024)}MB`,
                413
            );
        }
        return new ApplicationError(ErrorCodes.BAD_REQUEST, err.message, 400, { field: err.field });
    }

    const message = err instanceof Error ? err.message : String(err);
    const error = new ApplicationError(ErrorCodes.SERVER_ERROR, message, 500);
    if (err instanceof Error) {
        error.stack = err.stack;
    }
    return error;
}

/**
 * 全局错误处理中间件
 */
export const errorHandler = (
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction // eslint-disable-line @typescript-eslint/no-unused-vars
): void => {
    const error = toApplicationError(err);

    // 记录错误
    if (error.statusCode >= 500) {
        logger.error('服务器错误', {
            path: req.path,
            method: req.method,
            error: error.message,
            stack: error.stack
        });
    } else {
        logger.warn('客户端错误', {
            path: req.path,
            method: req.method,
            error: error.message,
            code: error.code,
            details: error.details
        });
    }

    // 发送适当的响应
    res.status(error.statusCode).json(
        createErrorResponse(
            error.code,
            error.message,
            config.server.isDevelopment ? error.details ?? error.stack : error.details
        )
    );
};

/**
 * 未捕获异常处理
 */
export const setupUncaughtExceptionHandling = (): void => {
    // 处理未捕获的异常
    process.on('uncaughtException', (error: Error) => {
        logger.error('未捕获的异常', { error: error.message, stack: error.stack });

        // 给应用程序一些时间来完成待处理的请求并关闭资源
        setTimeout(() => {
            process.exit(1);
        }, 1000);
    });

    // 处理未处理的Promise拒绝
    process.on('unhandledRejection', (reason: unknown) => {
        logger.error('未处理的Promise拒绝', reason);

        // 将未处理的拒绝转换为未捕获的异常
        throw reason;
    });
};
