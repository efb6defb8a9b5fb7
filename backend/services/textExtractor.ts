import fs from 'fs';
import { MimeTypes } from '../config/app';
import { ApplicationError } from '../middleware/errorHandler';
import { ErrorCodes } from '../utils/apiResponse';
import { logger } from '../utils/logger';

type TextParser = (buffer: Buffer) => Promise<string>;

// pdf-parse、mammoth 与 word-extractor 按需加载，只处理纯文本时不引入
const parsePdf: TextParser = async (buffer) => {
    const pdfParse = (await import('pdf-parse')).default;
    const data = await pdfParse(buffer);
    return data.text;
};

const parseDocx: TextParser = async (buffer) => {
    const mammoth = await import('mammoth');
    const result = await mammoth.extractRawText({ buffer });
    return result.value;
};

// 旧版 Word .doc：页眉、正文、页脚依次拼接
const parseDoc: TextParser = async (buffer) => {
    const WordExtractor = (await import('word-extractor')).default;
    const extracted = await new WordExtractor().extract(buffer);
    return [extracted.getHeaders({ includeFooters: false }), extracted.getBody(), extracted.getFooters()]
        .filter((part) => part.trim().length > 0)
        .join('\n');
};

const parsePlainText: TextParser = async (buffer) => buffer.toString('utf-8');

const PARSERS: Readonly<Record<string, TextParser>> = {
    [MimeTypes.PDF]: parsePdf,
    [MimeTypes.DOCX]: parseDocx,
    [MimeTypes.DOC]: parseDoc,
    [MimeTypes.TEXT]: parsePlainText
};

export function isSupportedMimeType(mimeType: string): boolean {
    return Object.prototype.hasOwnProperty.call(PARSERS, mimeType);
}

/**
 * 统一换行，制表符和不换行空格折叠为空格，逐行去除首尾空白
 */
export function cleanExtractedText(text: string): string {
    return text
        .replace(/\r\n?/g, '\n')
        .split('\n')
        .map((line) => line.replace(/[ \t\u00A0]+/g, ' ').trim())
        .join('\n')
        .trim();
}

/**
 * 读取上传的简历文件并取出纯文本
 */
export async function extractTextFromFile(filePath: string, mimeType: string): Promise<string> {
    const parser = isSupportedMimeType(mimeType) ? PARSERS[mimeType] : undefined;
    if (!parser) {
        throw new ApplicationError(
            ErrorCodes.UNSUPPORTED_FILE_TYPE,
            `不支持的文件类型: ${mimeType}`,
            400
        );
    }

    let buffer: Buffer;
    try {
        buffer = await fs.promises.readFile(filePath);
    } catch (error) {
        logger.error('读取简历文件失败', { filePath, error: error instanceof Error ? error.message : String(error) });
        throw new ApplicationError(
            ErrorCodes.RESUME_PARSING_FAILED,
            '无法读取简历文件',
            422
        );
    }

    try {
        const text = cleanExtractedText(await parser(buffer));
        logger.debug('简历文本提取完成', { mimeType, characters: text.length });
        return text;
    } catch (error) {
        logger.error('解析简历文件失败', { mimeType, error: error instanceof Error ? error.message : String(error) });
        throw new ApplicationError(
            ErrorCodes.RESUME_PARSING_FAILED,
            '简历文件解析失败',
            422
        );
    }
}
