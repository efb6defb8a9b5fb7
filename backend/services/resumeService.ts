import fs from 'fs';
import { isValidObjectId } from 'mongoose';
import Resume, { ResumeDocument } from '../models/Resume';
import { logger } from '../utils/logger';
import { ApplicationError } from '../middleware/errorHandler';
import { ErrorCodes } from '../utils/apiResponse';
import { AtsReport, createDefaultFields, ExtractedFields, RESUME_FIELDS } from '../types/resume';
import { extractResumeFields } from './fieldExtractor';
import { normalizeResumeEdits, prepareForAts } from './atsNormalizer';
import { AtsScorer } from './atsScorer';
import { extractTextFromFile } from './textExtractor';

export const IMPORTED_RESUME_TITLE = 'Imported Resume';
export const NEW_RESUME_TITLE = 'New Resume';
export const DEFAULT_TEMPLATE = 'default';

export interface UploadedResumeFile {
    path: string;
    originalName: string;
    mimeType: string;
}

export interface NewResumeOptions {
    userId: string;
    email?: string;
    templateName?: string;
}

// 用户编辑：20 个字段外加模板名
export type ResumeEdits = Partial<ExtractedFields> & { templateName?: string };

export interface ResumeQueryOptions {
    page?: number;
    limit?: number;
}

export interface ResumeList {
    resumes: ResumeDocument[];
    total: number;
    page: number;
    limit: number;
    totalPages: number;
}

export interface ImportedResume {
    resume: ResumeDocument;
    ats: AtsReport;
}

export interface ScoredUpload {
    fields: ExtractedFields;
    ats: AtsReport;
}

function createBlankFields(): ExtractedFields {
    return { ...createDefaultFields(), fullname: '', summary: '' };
}

export class ResumeService {
    /**
     * 导入简历文件：提取文本和字段，计算 ATS 分数后保存
     */
    static async importResume(file: UploadedResumeFile, userId: string): Promise<ImportedResume> {
        const { fields, ats } = await this.scoreUpload(file);

        const resume = await Resume.create({
            ...fields,
            title: fields.title || IMPORTED_RESUME_TITLE,
            userId,
            sourceFileName: file.originalName,
            atsComplianceScore: ats.score,
            atsIssues: ats.issues,
            atsWarnings: ats.warnings,
            atsRecommendations: ats.recommendations
        });

        logger.info('简历导入成功', {
            resumeId: resume.id,
            userId,
            fileName: file.originalName,
            score: ats.score
        });

        return { resume, ats };
    }

    /**
     * 按所选模板新建空白简历，邮箱取自当前用户
     */
    static async createResume(options: NewResumeOptions): Promise<ResumeDocument> {
        const resume = await Resume.create({
            ...createBlankFields(),
            title: NEW_RESUME_TITLE,
            email: options.email ?? '',
            userId: options.userId,
            templateName: options.templateName || DEFAULT_TEMPLATE
        });

        logger.info('已创建空白简历', { resumeId: resume.id, userId: options.userId, templateName: resume.templateName });

        return resume;
    }

    /**
     * 只评分不保存
     */
    static async scoreUpload(file: UploadedResumeFile): Promise<ScoredUpload> {
        const text = await this.readUpload(file);
        const fields = extractResumeFields(text);
        const ats = AtsScorer.score(prepareForAts(fields));
        return { fields, ats };
    }

    static parseText(text: string): ExtractedFields {
        return extractResumeFields(text);
    }

    /**
     * 获取用户的简历列表
     */
    static async getResumes(userId: string, options: ResumeQueryOptions = {}): Promise<ResumeList> {
        const page = Math.max(1, options.page ?? 1);
        const limit = Math.max(1, options.limit ?? 10);

        const total = await Resume.countDocuments({ userId });
        const resumes = await Resume.find({ userId })
            .sort({ createdAt: -1 })
            .skip((page - 1) * limit)
            .limit(limit);

        return {
            resumes,
            total,
            page,
            limit,
            totalPages: Math.ceil(total / limit)
        };
    }

    /**
     * 获取简历详情
     */
    static async getResumeById(resumeId: string, userId: string): Promise<ResumeDocument> {
        if (!isValidObjectId(resumeId)) {
            throw this.notFound();
        }

        const resume = await Resume.findOne({ _id: resumeId, userId });
        if (!resume) {
            throw this.notFound();
        }

        return resume;
    }

    /**
     * 保存用户编辑：规范化后只覆盖非空字段
     */
    static async updateResume(resumeId: string, userId: string, edits: ResumeEdits): Promise<ResumeDocument> {
        const resume = await this.getResumeById(resumeId, userId);
        const normalized = normalizeResumeEdits(edits);

        const updated: string[] = [];
        for (const field of RESUME_FIELDS) {
            const value = normalized[field];
            if (value) {
                resume[field] = value;
                updated.push(field);
            }
        }

        const templateName = edits.templateName?.trim();
        if (templateName) {
            resume.templateName = templateName;
            updated.push('templateName');
        }

        await resume.save();

        logger.info('简历已更新', { resumeId, fields: updated });

        return resume;
    }

    /**
     * 根据已保存的字段重新计算 ATS 分数
     */
    static async refreshAtsScore(resumeId: string, userId: string): Promise<AtsReport> {
        const resume = await this.getResumeById(resumeId, userId);
        const ats = AtsScorer.score(prepareForAts(this.toFields(resume)));

        resume.atsComplianceScore = ats.score;
        resume.atsIssues = ats.issues;
        resume.atsWarnings = ats.warnings;
        resume.atsRecommendations = ats.recommendations;
        await resume.save();

        logger.info('ATS 分数已更新', { resumeId, score: ats.score });

        return ats;
    }

    /**
     * 删除简历
     */
    static async deleteResume(resumeId: string, userId: string): Promise<void> {
        const resume = await this.getResumeById(resumeId, userId);
        await Resume.deleteOne({ _id: resume._id });

        logger.info('简历已删除', { resumeId });
    }

    static toFields(resume: ResumeDocument): ExtractedFields {
        const fields = createDefaultFields();
        for (const field of RESUME_FIELDS) {
            fields[field] = resume[field] ?? '';
        }
        return fields;
    }

    // 上传的临时文件读取后一律删除
    private static async readUpload(file: UploadedResumeFile): Promise<string> {
        try {
            return await extractTextFromFile(file.path, file.mimeType);
        } finally {
            await fs.promises.unlink(file.path).catch((error: unknown) => {
                logger.warn('删除临时文件失败', {
                    filePath: file.path,
                    error: error instanceof Error ? error.message : String(error)
                });
            });
        }
    }

    private static notFound(): ApplicationError {
        return new ApplicationError(
            ErrorCodes.RESUME_NOT_FOUND,
            '找不到指定的简历',
            404
        );
    }
}
