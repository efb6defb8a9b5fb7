import mongoose from 'mongoose';
import { config } from './app';
import { logger } from '../utils/logger';

const RECONNECT_DELAY_MS = 5000;

let listenersAttached = false;

// 连接到MongoDB
export const connectToDatabase = async (): Promise<typeof mongoose> => {
    logger.info('正在连接到MongoDB...');

    const connection = await mongoose.connect(config.database.uri, {
        serverSelectionTimeoutMS: config.database.serverSelectionTimeoutMS,
        socketTimeoutMS: config.database.socketTimeoutMS
    });

    logger.info('成功连接到MongoDB', {
        host: connection.connection.host,
        port: connection.connection.port,
        name: connection.connection.name
    });

    setupConnectionListeners();

    return connection;
};

const reconnect = (): void => {
    connectToDatabase().catch((error: unknown) => {
        logger.error('重新连接MongoDB失败', error);
        setTimeout(reconnect, RECONNECT_DELAY_MS);
    });
};

// 设置连接事件监听器
const setupConnectionListeners = (): void => {
    if (listenersAttached) {
        return;
    }
    listenersAttached = true;

    const db = mongoose.connection;

    db.on('error', (err: unknown) => {
        logger.error('MongoDB连接错误', err);
    });

    db.on('disconnected', () => {
        logger.warn('与MongoDB的连接已断开，尝试重新连接...');
        setTimeout(reconnect, RECONNECT_DELAY_MS);
    });

    process.on('SIGINT', () => {
        db.close()
            .then(() => {
                logger.info('MongoDB连接已关闭');
                process.exit(0);
            })
            .catch((error: unknown) => {
                logger.error('关闭MongoDB连接失败', error);
                process.exit(1);
            });
    });
};

export default { connectToDatabase };
