import path from 'path';
import dotenv from 'dotenv';

// 加载环境变量
dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
    return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

export const MimeTypes = {
    PDF: 'application/pdf',
    DOCX: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    DOC: 'application/msword',
    TEXT: 'text/plain'
} as const;

// 应用配置
export const config = {
    // 服务器配置
    server: {
        port: parseInt(process.env.PORT || '4000', 10),
        host: process.env.HOST || '0.0.0.0',
        env: process.env.NODE_ENV || 'development',
        isDevelopment: process.env.NODE_ENV === 'development',
    },

    // 文件上传配置
    upload: {
        directory: process.env.UPLOAD_DIR || path.join(process.cwd(), 'uploads'),
        maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '16777216', 10), // 16MB
    },

    // 数据库配置
    database: {
        uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/resume-import',
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
    },

    // JWT配置
    jwt: {
        secret: process.env.JWT_SECRET || 'change-me',
    },

    // API限流配置
    rateLimit: {
        windowMs: parseInt(process.env.RATE_LIMIT_WINDOW || '900000', 10), // 15分钟
        max: parseInt(process.env.RATE_LIMIT_MAX || '100', 10), // 每IP 15分钟内最多100个请求
    },

    // 日志配置
    logging: {
        directory: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
        level: parseLogLevel(process.env.LOG_LEVEL),
        toFile: process.env.LOG_TO_FILE !== 'false',
    },

    // CORS配置
    cors: {
        origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
        credentials: true,
    }
};

export default config;
