// 简历结构化字段（固定 20 个键，全部为字符串）
export const RESUME_FIELDS = [
    'title',
    'fullname',
    'email',
    'phone',
    'location',
    'summary',
    'skills',
    'experience',
    'education',
    'projects',
    'certifications',
    'awards',
    'languages',
    'linkedin',
    'github',
    'website',
    'dob',
    'nationality',
    'softskills',
    'career_objective'
] as const;

export type ResumeField = typeof RESUME_FIELDS[number];

export type ExtractedFields = Record<ResumeField, string>;

// 由章节标题切分得到内容的字段
export const SECTION_FIELDS = [
    'summary',
    'skills',
    'experience',
    'projects',
    'education',
    'certifications',
    'languages',
    'awards'
] as const;

export type SectionField = typeof SECTION_FIELDS[number];

export const DEFAULT_FULLNAME = 'Your Name';
export const DEFAULT_SUMMARY = 'PDF loaded successfully! Edit your details above.';

/**
 * 提取失败或文本为空时使用的默认字段
 */
export function createDefaultFields(): ExtractedFields {
    return {
        title: '',
        fullname: DEFAULT_FULLNAME,
        email: '',
        phone: '',
        location: '',
        summary: DEFAULT_SUMMARY,
        skills: '',
        experience: '',
        education: '',
        projects: '',
        certifications: '',
        awards: '',
        languages: '',
        linkedin: '',
        github: '',
        website: '',
        dob: '',
        nationality: '',
        softskills: '',
        career_objective: ''
    };
}

// ATS 评分输入：缺失的键视为空值
export type AtsFieldValue = string | readonly string[] | null | undefined;

export type AtsInput = Partial<Record<string, AtsFieldValue>>;

export interface AtsReport {
    score: number;
    issues: string[];
    warnings: string[];
    recommendations: string[];
}
