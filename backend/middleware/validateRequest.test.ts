import { describe, it, expect } from 'vitest';
import { validate, ValidationPatterns } from './validateRequest';

describe('validate', () => {
    it('reports missing required fields', () => {
        expect(validate({}, { text: { type: 'string', required: true } })).toEqual({ text: 'text 字段是必填的' });
        expect(validate({ text: '' }, { text: { type: 'string', required: true } })).toEqual({ text: 'text 字段是必填的' });
    });

    it('accepts numeric query strings within range', () => {
        const schema = { page: { type: 'number' as const, min: 1 }, limit: { type: 'number' as const, max: 100 } };

        expect(validate({ page: '2', limit: '50' }, schema)).toEqual({});
        expect(validate({ page: '0' }, schema)).toEqual({ page: 'page 不能小于 1' });
        expect(validate({ limit: '500' }, schema)).toEqual({ limit: 'limit 不能大于 100' });
        expect(validate({ page: 'abc' }, schema)).toEqual({ page: 'page 字段类型应为 number' });
    });

    it('checks string length and patterns', () => {
        expect(validate({ summary: 'abcdef' }, { summary: { type: 'string', max: 5 } }))
            .toEqual({ summary: 'summary 长度不能大于 5 个字符' });
        expect(validate({ id: 'xyz' }, { id: { type: 'string', pattern: ValidationPatterns.objectId } }))
            .toEqual({ id: 'id 格式不正确' });
        expect(validate({ id: '507f1f77bcf86cd799439011' }, { id: { type: 'string', pattern: ValidationPatterns.objectId } }))
            .toEqual({});
    });

    it('rejects values of the wrong type', () => {
        expect(validate({ skills: ['Go'] }, { skills: { type: 'string' } })).toEqual({ skills: 'skills 字段类型应为 string' });
    });

    it('runs custom checks', () => {
        const schema = {
            email: {
                type: 'string' as const,
                custom: (value: unknown) => ({ valid: String(value).includes('@'), message: '邮箱格式不正确' })
            }
        };

        expect(validate({ email: 'jane' }, schema)).toEqual({ email: '邮箱格式不正确' });
    });

    it('ignores non-object input', () => {
        expect(validate(undefined, { text: { type: 'string' } })).toEqual({});
    });
});
