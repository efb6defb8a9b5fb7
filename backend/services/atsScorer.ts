import { AtsFieldValue, AtsInput, AtsReport, DEFAULT_FULLNAME, DEFAULT_SUMMARY } from '../types/resume';
import { parseSkillList } from './atsNormalizer';
import { charLength } from '../utils/text';

// 各项检查的扣分（满分 100）
export const ATS_DEDUCTIONS = {
    missingEmail: 15,
    invalidEmail: 5,
    missingPhone: 10,
    shortPhone: 5,
    missingName: 10,
    missingSummary: 10,
    shortSummary: 5,
    missingSkills: 15,
    fewSkills: 5,
    missingExperience: 15,
    missingEducation: 10,
    missingLocation: 3,
    decorativeCharacters: 3,
    missingKeyword: 2,
    maxKeywordDeduction: 10
} as const;

const MIN_SUMMARY_LENGTH = 50;
const MIN_SKILL_COUNT = 5;
const MIN_PHONE_DIGITS = 10;

const EMAIL_FORMAT = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;
const DECORATIVE_CHARACTERS = /[\u2600-\u27BF]|[\u{1F300}-\u{1FAFF}]/u;

function asText(value: AtsFieldValue): string {
    if (value === null || value === undefined) {
        return '';
    }
    if (typeof value === 'string') {
        return value.trim();
    }
    return value.map((item) => item.trim()).filter(Boolean).join(', ');
}

function asList(value: AtsFieldValue): string[] {
    if (value === null || value === undefined) {
        return [];
    }
    return typeof value === 'string' ? value.split(',') : [...value];
}

function countSkills(value: AtsFieldValue): number {
    if (value === null || value === undefined) {
        return 0;
    }
    if (typeof value === 'string') {
        return parseSkillList(value).length;
    }
    return value.filter((item) => item.trim().length > 0).length;
}

class ReportBuilder {
    private deductions = 0;
    readonly issues: string[] = [];
    readonly warnings: string[] = [];
    readonly recommendations: string[] = [];

    issue(message: string, recommendation: string, deduction: number): void {
        this.issues.push(message);
        this.recommendations.push(recommendation);
        this.deductions += deduction;
    }

    warning(message: string, recommendation: string, deduction: number): void {
        this.warnings.push(message);
        this.recommendations.push(recommendation);
        this.deductions += deduction;
    }

    recommend(recommendation: string): void {
        this.recommendations.push(recommendation);
    }

    build(): AtsReport {
        return {
            score: Math.max(0, Math.min(100, Math.round(100 - this.deductions))),
            issues: this.issues,
            warnings: this.warnings,
            recommendations: this.recommendations
        };
    }
}

export class AtsScorer {
    /**
     * 评估字段的完整性与格式，得出 0-100 的 ATS 兼容分
     * 缺失的键视为空值；本方法不会抛出异常
     * 未显式传入关键词时使用 fields.keywords
     */
    static score(fields: AtsInput, keywords?: readonly string[]): AtsReport {
        const report = new ReportBuilder();
        const field = (key: string): string => asText(fields[key]);

        const email = field('email');
        if (!email) {
            report.issue(
                'Missing contact information: email address',
                'Add a professional email address to the resume header.',
                ATS_DEDUCTIONS.missingEmail
            );
        } else if (!EMAIL_FORMAT.test(email)) {
            report.warning(
                'Email address format looks invalid',
                'Check that the email address is spelled correctly (name@domain.com).',
                ATS_DEDUCTIONS.invalidEmail
            );
        }

        const phone = field('phone');
        if (!phone) {
            report.issue(
                'Missing contact information: phone number',
                'Add a phone number with country code to the resume header.',
                ATS_DEDUCTIONS.missingPhone
            );
        } else if (phone.replace(/\D/g, '').length < MIN_PHONE_DIGITS) {
            report.warning(
                'Phone number has fewer than 10 digits',
                'Use a complete phone number including the area or country code.',
                ATS_DEDUCTIONS.shortPhone
            );
        }

        const fullname = field('fullname');
        if (!fullname || fullname === DEFAULT_FULLNAME) {
            report.issue(
                'Missing candidate name',
                'Put your full name on the first line of the resume.',
                ATS_DEDUCTIONS.missingName
            );
        }

        const summary = field('summary');
        if (!summary || summary === DEFAULT_SUMMARY) {
            report.issue(
                'Missing professional summary',
                'Add a 2-4 sentence professional summary highlighting your experience and strengths.',
                ATS_DEDUCTIONS.missingSummary
            );
        } else if (charLength(summary) < MIN_SUMMARY_LENGTH) {
            report.warning(
                'Professional summary is too short',
                `Expand the summary to at least ${MIN_SUMMARY_LENGTH} characters with your role, experience and focus.`,
                ATS_DEDUCTIONS.shortSummary
            );
        }

        const skillCount = countSkills(fields.skills);
        if (skillCount === 0) {
            report.issue(
                'Missing skills section',
                'Add a skills section listing your key technical skills, separated by commas.',
                ATS_DEDUCTIONS.missingSkills
            );
        } else if (skillCount < MIN_SKILL_COUNT) {
            report.warning(
                `Only ${skillCount} skill${skillCount === 1 ? '' : 's'} listed`,
                `List at least ${MIN_SKILL_COUNT} relevant skills so keyword filters can match your profile.`,
                ATS_DEDUCTIONS.fewSkills
            );
        }

        if (!field('experience')) {
            report.issue(
                'Missing work experience section',
                'Add work experience or internships with role, company, dates and achievements.',
                ATS_DEDUCTIONS.missingExperience
            );
        }

        if (!field('education')) {
            report.issue(
                'Missing education section',
                'Add your education with degree, institution and graduation year.',
                ATS_DEDUCTIONS.missingEducation
            );
        }

        if (!field('location')) {
            report.warning(
                'Missing location',
                'Add your city and country so recruiters can filter by location.',
                ATS_DEDUCTIONS.missingLocation
            );
        }

        const allText = Object.entries(fields)
            .filter(([key]) => key !== 'keywords')
            .map(([, value]) => asText(value))
            .join('\n');
        if (DECORATIVE_CHARACTERS.test(allText)) {
            report.warning(
                'Decorative symbols or emoji detected',
                'Replace icons and emoji with plain text; ATS parsers often drop them.',
                ATS_DEDUCTIONS.decorativeCharacters
            );
        }

        const lowerText = allText.toLowerCase();
        const missingKeywords = (keywords ?? asList(fields.keywords))
            .map((keyword) => keyword.trim())
            .filter((keyword) => keyword.length > 0 && !lowerText.includes(keyword.toLowerCase()));
        if (missingKeywords.length > 0) {
            report.warning(
                `Missing target keywords: ${missingKeywords.join(', ')}`,
                'Work the missing keywords into your summary, skills or experience where they genuinely apply.',
                Math.min(missingKeywords.length * ATS_DEDUCTIONS.missingKeyword, ATS_DEDUCTIONS.maxKeywordDeduction)
            );
        }

        if (!field('projects')) {
            report.recommend('Add a projects section to showcase hands-on work.');
        }

        if (!field('certifications')) {
            report.recommend('Add relevant certifications or courses to strengthen your profile.');
        }

        return report.build();
    }
}
