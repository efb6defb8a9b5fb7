import { Server } from 'http';
import { AddressInfo } from 'net';
import jwt from 'jsonwebtoken';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import app from './app';

const TOKEN = jwt.sign({ id: 'user-1', email: 'jane@example.com' }, 'test-secret');

const JANE_DOE = [
    'Jane Doe',
    'jane.doe@example.com',
    '+91 9876543210',
    'Bangalore, India',
    'SUMMARY',
    'Experienced backend engineer with 5 years building distributed systems.',
    'SKILLS',
    'Python, Go, SQL, Docker',
    'EXPERIENCE',
    'Backend Engineer at Foo Corp 2019-2024',
    'Built payment systems.'
].join('\n');

describe('resume API', () => {
    let server: Server;
    let baseUrl: string;

    beforeAll(async () => {
        server = await new Promise<Server>((resolve) => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address: AddressInfo | string | null = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('server is not listening on a TCP port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
    });

    const authHeaders = { Authorization: `Bearer ${TOKEN}` };

    const upload = (content: string, type: string, name: string): FormData => {
        const form = new FormData();
        form.append('resume', new Blob([content], { type }), name);
        return form;
    };

    it('reports health', async () => {
        const res = await fetch(`${baseUrl}/api/health`);

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ success: true, data: { status: 'OK' } });
    });

    it('requires a token for resume routes', async () => {
        const res = await fetch(`${baseUrl}/api/resume/list`);

        expect(res.status).toBe(401);
        expect(await res.json()).toMatchObject({ success: false, error: { code: 'UNAUTHORIZED' } });
    });

    it('rejects a token signed with another secret', async () => {
        const forged = jwt.sign({ id: 'user-1' }, 'other-secret');
        const res = await fetch(`${baseUrl}/api/resume/list`, { headers: { Authorization: `Bearer ${forged}` } });

        expect(res.status).toBe(401);
    });

    it('extracts fields from posted text', async () => {
        const res = await fetch(`${baseUrl}/api/resume/parse-text`, {
            method: 'POST',
            headers: { ...authHeaders, 'Content-Type': 'application/json' },
            body: JSON.stringify({ text: JANE_DOE })
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            success: true,
            data: {
                fullname: 'Jane Doe',
                email: 'jane.doe@example.com',
                skills: 'Python, SQL, Docker'
            }
        });
    });

    it('validates the text body', async () => {
        const res = await fetch(`${baseUrl}/api/resume/parse-text`, {
            method: 'POST',
            headers: { ...authHeaders, 'Content-Type': 'application/json' },
            body: JSON.stringify({})
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({
            success: false,
            error: { code: 'VALIDATION_ERROR', details: { text: 'text 字段是必填的' } }
        });
    });

    it('scores an uploaded text resume', async () => {
        const res = await fetch(`${baseUrl}/api/resume/ats-score`, {
            method: 'POST',
            headers: authHeaders,
            body: upload(JANE_DOE, 'text/plain', 'jane.txt')
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            success: true,
            data: {
                score: 85,
                issues: ['Missing education section'],
                warnings: ['Only 3 skills listed']
            }
        });
    });

    it('rejects unsupported uploads', async () => {
        const res = await fetch(`${baseUrl}/api/resume/ats-score`, {
            method: 'POST',
            headers: authHeaders,
            body: upload('binary', 'application/vnd.ms-powerpoint', 'deck.ppt')
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ success: false, error: { code: 'UNSUPPORTED_FILE_TYPE' } });
    });

    it('rejects a scoring request without a file', async () => {
        const res = await fetch(`${baseUrl}/api/resume/ats-score`, { method: 'POST', headers: authHeaders });

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ success: false, error: { code: 'BAD_REQUEST' } });
    });

    it('validates the template name of a new resume', async () => {
        const res = await fetch(`${baseUrl}/api/resume`, {
            method: 'POST',
            headers: { ...authHeaders, 'Content-Type': 'application/json' },
            body: JSON.stringify({ templateName: '../modern' })
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({
            success: false,
            error: { code: 'VALIDATION_ERROR', details: { templateName: 'templateName 格式不正确' } }
        });
    });

    it('validates resume ids', async () => {
        const res = await fetch(`${baseUrl}/api/resume/not-an-id`, { headers: authHeaders });

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ success: false, error: { code: 'VALIDATION_ERROR' } });
    });

    it('answers unknown routes with 404', async () => {
        const res = await fetch(`${baseUrl}/api/unknown`);

        expect(res.status).toBe(404);
        expect(await res.json()).toMatchObject({ success: false, error: { code: 'NOT_FOUND' } });
    });
});
