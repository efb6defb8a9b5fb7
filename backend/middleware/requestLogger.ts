import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace Express {
        interface Request {
            startTime?: number;
        }
    }
}

/**
 * 请求日志记录中间件
 * 响应结束时记录请求详情和处理时间
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    req.startTime = Date.now();

    res.on('finish', () => {
        const responseTime = Date.now() - (req.startTime ?? Date.now());
        logger.logRequest(req, res, responseTime);
    });

    next();
}
