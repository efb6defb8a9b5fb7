import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { cleanExtractedText, extractTextFromFile, isSupportedMimeType } from './textExtractor';

describe('cleanExtractedText', () => {
    it('normalises line endings and folds tabs and non-breaking spaces', () => {
        expect(cleanExtractedText('  Jane\tDoe  \r\nEngineer\u00A0 at Foo\r\n\r\n')).toBe('Jane Doe\nEngineer at Foo');
    });
});

describe('extractTextFromFile', () => {
    let dir: string;

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'text-extractor-'));
    });

    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads plain text files as UTF-8', async () => {
        const file = path.join(dir, 'resume.txt');
        fs.writeFileSync(file, 'José Álvarez\r\nSKILLS\r\nPython, SQL', 'utf-8');

        await expect(extractTextFromFile(file, 'text/plain')).resolves.toBe('José Álvarez\nSKILLS\nPython, SQL');
    });

    it('reports a missing file as a parsing failure', async () => {
        await expect(extractTextFromFile(path.join(dir, 'missing.txt'), 'text/plain')).rejects.toMatchObject({
            code: 'RESUME_PARSING_FAILED',
            statusCode: 422
        });
    });

    it('rejects unsupported file types', async () => {
        await expect(extractTextFromFile(path.join(dir, 'deck.ppt'), 'application/vnd.ms-powerpoint')).rejects.toMatchObject({
            code: 'UNSUPPORTED_FILE_TYPE',
            statusCode: 400
        });
    });

    it('reports a legacy Word file that is not an OLE document as a parsing failure', async () => {
        const file = path.join(dir, 'resume.doc');
        fs.writeFileSync(file, 'plain text saved with a .doc extension', 'utf-8');

        await expect(extractTextFromFile(file, 'application/msword')).rejects.toMatchObject({
            code: 'RESUME_PARSING_FAILED',
            statusCode: 422
        });
    });

    it('knows which types it can read', () => {
        expect(isSupportedMimeType('application/pdf')).toBe(true);
        expect(isSupportedMimeType('application/vnd.openxmlformats-officedocument.wordprocessingml.document')).toBe(true);
        expect(isSupportedMimeType('application/msword')).toBe(true);
        expect(isSupportedMimeType('application/vnd.ms-powerpoint')).toBe(false);
        expect(isSupportedMimeType('toString')).toBe(false);
    });
});
