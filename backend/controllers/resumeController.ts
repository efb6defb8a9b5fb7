import { Request, Response } from 'express';
import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { ResumeEdits, ResumeService, UploadedResumeFile } from '../services/resumeService';
import { isSupportedMimeType } from '../services/textExtractor';
import { createSuccessResponse, ErrorCodes } from '../utils/apiResponse';
import { config } from '../config/app';
import { ApplicationError, asyncHandler } from '../middleware/errorHandler';
import { validateRequest, ValidationPatterns, ValidationSchema } from '../middleware/validateRequest';
import { RESUME_FIELDS } from '../types/resume';

const uploadDir = config.upload.directory;

// 配置 Multer 存储
const storage = multer.diskStorage({
    destination: (req, file, cb) => {
        fs.promises.mkdir(uploadDir, { recursive: true })
            .then(() => cb(null, uploadDir))
            .catch((error: Error) => cb(error, uploadDir));
    },
    filename: (req, file, cb) => {
        const uniqueSuffix = `${Date.now()}-${uuidv4()}`;
        cb(null, `${uniqueSuffix}${path.extname(file.originalname)}`);
    }
});

// 文件过滤器：只接受 PDF、DOCX、DOC 和纯文本
const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
    if (isSupportedMimeType(file.mimetype)) {
        cb(null, true);
    } else {
        cb(new ApplicationError(
            ErrorCodes.UNSUPPORTED_FILE_TYPE,
            `不支持的文件类型：${file.mimetype}`,
            400
        ));
    }
};

const upload = multer({
    storage,
    fileFilter,
    limits: {
        fileSize: config.upload.maxFileSize
    }
});

const idParams: ValidationSchema = {
    id: {
        type: 'string',
        required: true,
        pattern: ValidationPatterns.objectId
    }
};

const templateNameRule = {
    type: 'string' as const,
    pattern: ValidationPatterns.templateName
};

const editableFieldsSchema: ValidationSchema = {
    ...Object.fromEntries(RESUME_FIELDS.map((field) => [field, { type: 'string' as const, max: 20000 }])),
    templateName: templateNameRule
};

function requireFile(req: Request): UploadedResumeFile {
    if (!req.file) {
        throw new ApplicationError(ErrorCodes.BAD_REQUEST, '没有上传文件', 400);
    }
    return {
        path: req.file.path,
        originalName: req.file.originalname,
        mimeType: req.file.mimetype
    };
}

// 路由上已挂载 requireAuth
function currentUserId(req: Request): string {
    if (!req.user) {
        throw new ApplicationError(ErrorCodes.UNAUTHORIZED, '需要登录才能访问此资源', 401);
    }
    return req.user.id;
}

function readString(body: unknown, key: string): string | undefined {
    if (typeof body !== 'object' || body === null) {
        return undefined;
    }
    const value: unknown = Object.entries(body).find(([name]) => name === key)?.[1];
    return typeof value === 'string' ? value : undefined;
}

function readEdits(body: unknown): ResumeEdits {
    const edits: ResumeEdits = {};
    for (const field of RESUME_FIELDS) {
        const value = readString(body, field);
        if (value !== undefined) {
            edits[field] = value;
        }
    }
    const templateName = readString(body, 'templateName');
    if (templateName !== undefined) {
        edits.templateName = templateName;
    }
    return edits;
}

function readPositiveInt(value: unknown): number | undefined {
    const num = typeof value === 'string' ? parseInt(value, 10) : NaN;
    return Number.isFinite(num) && num > 0 ? num : undefined;
}

/**
 * 导入简历：提取字段、评分并保存
 */
export const importResume = [
    upload.single('resume'),

    asyncHandler(async (req: Request, res: Response) => {
        const file = requireFile(req);
        const { resume, ats } = await ResumeService.importResume(file, currentUserId(req));

        res.status(201).json(createSuccessResponse({ resume, ats }));
    })
];

/**
 * 新建空白简历，可指定模板
 */
export const createResume = [
    validateRequest({ body: { templateName: templateNameRule } }),

    asyncHandler(async (req: Request, res: Response) => {
        const resume = await ResumeService.createResume({
            userId: currentUserId(req),
            email: req.user?.email,
            templateName: readString(req.body, 'templateName')
        });

        res.status(201).json(createSuccessResponse(resume));
    })
];

/**
 * 只返回 ATS 评分，不保存
 */
export const scoreResume = [
    upload.single('resume'),

    asyncHandler(async (req: Request, res: Response) => {
        const file = requireFile(req);
        const { ats } = await ResumeService.scoreUpload(file);

        res.json(createSuccessResponse(ats));
    })
];

/**
 * 直接从文本提取字段
 */
export const parseText = [
    validateRequest({
        body: {
            text: {
                type: 'string',
                required: true,
                max: 500000
            }
        }
    }),

    asyncHandler(async (req: Request, res: Response) => {
        const text = readString(req.body, 'text') ?? '';

        res.json(createSuccessResponse(ResumeService.parseText(text)));
    })
];

/**
 * 获取简历列表
 */
export const getResumes = [
    validateRequest({
        query: {
            page: { type: 'number', min: 1 },
            limit: { type: 'number', min: 1, max: 100 }
        }
    }),

    asyncHandler(async (req: Request, res: Response) => {
        const result = await ResumeService.getResumes(currentUserId(req), {
            page: readPositiveInt(req.query.page),
            limit: readPositiveInt(req.query.limit)
        });

        res.json(createSuccessResponse(result.resumes, {
            pagination: {
                page: result.page,
                limit: result.limit,
                total: result.total,
                totalPages: result.totalPages
            }
        }));
    })
];

/**
 * 获取简历详情
 */
export const getResumeById = [
    validateRequest({ params: idParams }),

    asyncHandler(async (req: Request, res: Response) => {
        const resume = await ResumeService.getResumeById(req.params.id, currentUserId(req));
        res.json(createSuccessResponse(resume));
    })
];

/**
 * 保存编辑后的字段
 */
export const updateResume = [
    validateRequest({ params: idParams, body: editableFieldsSchema }),

    asyncHandler(async (req: Request, res: Response) => {
        const resume = await ResumeService.updateResume(req.params.id, currentUserId(req), readEdits(req.body));
        res.json(createSuccessResponse(resume));
    })
];

/**
 * 按已保存的字段重新评分
 */
export const refreshAtsScore = [
    validateRequest({ params: idParams }),

    asyncHandler(async (req: Request, res: Response) => {
        const ats = await ResumeService.refreshAtsScore(req.params.id, currentUserId(req));
        res.json(createSuccessResponse(ats));
    })
];

/**
 * 删除简历
 */
export const deleteResume = [
    validateRequest({ params: idParams }),

    asyncHandler(async (req: Request, res: Response) => {
        await ResumeService.deleteResume(req.params.id, currentUserId(req));
        res.json(createSuccessResponse({ message: '简历已删除' }));
    })
];
