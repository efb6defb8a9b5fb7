import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { config } from '../config/app';
import { createErrorResponse, ErrorCodes } from '../utils/apiResponse';
import { logger } from '../utils/logger';

export interface AuthUser {
    id: string;
    email?: string;
}

declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace Express {
        interface Request {
            user?: AuthUser;
        }
    }
}

function toAuthUser(payload: string | jwt.JwtPayload): AuthUser | undefined {
    if (typeof payload === 'string') {
        return undefined;
    }
    const { id, email } = payload;
    if (typeof id !== 'string' || !id) {
        return undefined;
    }
    return typeof email === 'string' ? { id, email } : { id };
}

/**
 * 验证JWT令牌并将用户信息附加到请求对象
 * 没有令牌或令牌无效时不阻止请求，按匿名用户处理
 */
export function authenticateToken(req: Request, res: Response, next: NextFunction): void {
    const authHeader = req.headers['authorization'];
    const token = authHeader && authHeader.split(' ')[1]; // Bearer TOKEN格式

    if (!token) {
        next();
        return;
    }

    try {
        const user = toAuthUser(jwt.verify(token, config.jwt.secret));
        if (user) {
            req.user = user;
        } else {
            logger.warn('令牌缺少用户标识');
        }
    } catch (error) {
        logger.warn('无效的令牌', { error: error instanceof Error ? error.message : String(error) });
    }

    next();
}

/**
 * 要求用户必须登录
 */
export function requireAuth(req: Request, res: Response, next: NextFunction): void {
    if (!req.user) {
        res.status(401).json(
            createErrorResponse(
                ErrorCodes.UNAUTHORIZED,
                '需要登录才能访问此资源'
            )
        );
        return;
    }

    next();
}
