import { Request, Response, NextFunction } from 'express';
import { createErrorResponse, ErrorCodes } from '../utils/apiResponse';
import { logger } from '../utils/logger';

type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldRule {
    type: FieldType;
    required?: boolean;
    min?: number;
    max?: number;
    pattern?: RegExp;
    enum?: readonly string[];
    custom?: (value: unknown) => boolean | { valid: boolean; message: string };
}

// 验证规则类型定义
export interface ValidationSchema {
    [key: string]: FieldRule;
}

// 验证错误格式
export interface ValidationErrors {
    [key: string]: string;
}

/**
 * 请求验证中间件
 * 验证请求的参数、查询和请求体是否符合指定的Schema
 */
export function validateRequest(schema: {
    params?: ValidationSchema;
    query?: ValidationSchema;
    body?: ValidationSchema;
}) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const errors: ValidationErrors = {};

        if (schema.params) {
            Object.assign(errors, validate(req.params, schema.params));
        }

        if (schema.query) {
            Object.assign(errors, validate(req.query, schema.query));
        }

        if (schema.body) {
            Object.assign(errors, validate(req.body, schema.body));
        }

        if (Object.keys(errors).length > 0) {
            logger.warn('请求验证失败', {
                method: req.method,
                path: req.path,
                errors
            });

            res.status(400).json(
                createErrorResponse(
                    ErrorCodes.VALIDATION_ERROR,
                    '请求参数验证失败',
                    errors
                )
            );
            return;
        }

        next();
    };
}

function readField(data: unknown, field: string): unknown {
    if (typeof data !== 'object' || data === null) {
        return undefined;
    }
    return Object.entries(data).find(([key]) => key === field)?.[1];
}

/**
 * 验证数据是否符合指定的Schema
 */
export function validate(data: unknown, schema: ValidationSchema): ValidationErrors {
    const errors: ValidationErrors = {};

    for (const [field, rules] of Object.entries(schema)) {
        const value = readField(data, field);

        if (rules.required && (value === undefined || value === null || value === '')) {
            errors[field] = `${field} 字段是必填的`;
            continue;
        }

        if (value === undefined || value === null) {
            continue;
        }

        if (!validateType(value, rules.type)) {
            errors[field] = `${field} 字段类型应为 ${rules.type}`;
            continue;
        }

        const message = checkRange(field, value, rules) ?? checkFormat(field, value, rules);
        if (message) {
            errors[field] = message;
        }
    }

    return errors;
}

// 数值范围或字符串长度
function checkRange(field: string, value: unknown, rules: FieldRule): string | undefined {
    if (rules.type === 'number') {
        const num = Number(value);
        if (rules.min !== undefined && num < rules.min) {
            return `${field} 不能小于 ${rules.min}`;
        }
        if (rules.max !== undefined && num > rules.max) {
            return `${field} 不能大于 ${rules.max}`;
        }
    }

    if (typeof value === 'string' && rules.type === 'string') {
        if (rules.min !== undefined && value.length < rules.min) {
            return `${field} 长度不能小于 ${rules.min} 个字符`;
        }
        if (rules.max !== undefined && value.length > rules.max) {
            return `${field} 长度不能大于 ${rules.max} 个字符`;
        }
    }

    return undefined;
}

function checkFormat(field: string, value: unknown, rules: FieldRule): string | undefined {
    if (rules.pattern && rules.type === 'string' && !rules.pattern.test(String(value))) {
        return `${field} 格式不正确`;
    }

    if (rules.enum && rules.enum.length > 0 && !rules.enum.includes(String(value))) {
        return `${field} 必须是以下值之一: ${rules.enum.join(', ')}`;
    }

    if (rules.custom) {
        const result = rules.custom(value);
        if (typeof result === 'boolean') {
            return result ? undefined : `${field} 验证失败`;
        }
        if (!result.valid) {
            return result.message || `${field} 验证失败`;
        }
    }

    return undefined;
}

/**
 * 验证值的类型是否符合预期
 */
function validateType(value: unknown, type: FieldType): boolean {
    switch (type) {
        case 'string':
            return typeof value === 'string';
        case 'number':
            return value !== '' && !isNaN(Number(value));
        case 'boolean':
            return typeof value === 'boolean' || value === 'true' || value === 'false';
        case 'array':
            return Array.isArray(value);
        case 'object':
            return typeof value === 'object' && !Array.isArray(value) && value !== null;
    }
}

// 预定义的验证模式
export const ValidationPatterns = {
    objectId: /^[0-9a-fA-F]{24}$/,
    templateName: /^[\w-]{1,40}$/
};
