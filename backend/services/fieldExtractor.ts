import { DEFAULT_CATALOG, ExtractionCatalog } from '../config/extractionCatalog';
import { createDefaultFields, ExtractedFields, RESUME_FIELDS, SectionField } from '../types/resume';
import { logger } from '../utils/logger';
import { charLength, truncateChars } from '../utils/text';
import { normalizeDate } from './atsNormalizer';
import { locateHeaders, SectionPositions, sliceSection } from './sectionSegmenter';

/**
 * 单个检测阶段的结果：命中则带值，否则由调用方回退到默认值
 */
export type Detection<T = string> = { found: true; value: T } | { found: false };

const detected = <T>(value: T): Detection<T> => ({ found: true, value });

const NOT_FOUND: Detection<never> = { found: false };

function valueOr<T>(detection: Detection<T>, fallback: T): T {
    return detection.found ? detection.value : fallback;
}

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const WEBSITE_PATTERN = /(?:https?:\/\/|www\.)[^\s,;|]+/gi;
const DOB_PATTERN = /^(?:date\s+of\s+birth|d\.?o\.?b\.?)(?:\s*[:\-–]\s*|\s+)(.+)$/i;
const NATIONALITY_PATTERN = /^nationality(?:\s*[:\-–]\s*|\s+)(.+)$/i;
const SKILL_DELIMITERS = /[,•|/\n]/;
const LETTER_OR_SPACE = /[\p{L}\s]/u;
const LETTER = /\p{L}/u;

const NAME_SCAN_LINES = 15;
const LOCATION_FALLBACK_SCAN_LINES = 10;
const TITLE_SCAN_LINES = 25;
const EXPERIENCE_FALLBACK_LINES = 14;
const MAX_SKILLS = 30;

/**
 * 拆分文本为非空、已去除首尾空白的行
 */
export function splitLines(text: string): string[] {
    return text
        .split(/\r\n|\r|\n|\f|\v|\u2028|\u2029/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

function capped(lines: readonly string[], separator: string, maxChars: number): string {
    return truncateChars(lines.join(separator), maxChars);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function detectName(lines: readonly string[], skipMarkers: readonly string[]): Detection {
    for (const line of lines.slice(0, NAME_SCAN_LINES)) {
        const lower = line.toLowerCase();
        if (skipMarkers.some((marker) => lower.includes(marker.toLowerCase()))) {
            continue;
        }

        const words = line.split(/\s+/);
        const chars = Array.from(line);
        if (words.length < 2 || words.length > 4 || chars.length >= 50) {
            continue;
        }

        const alphaCount = chars.filter((c) => LETTER_OR_SPACE.test(c)).length;
        if (alphaCount > 0 && alphaCount / chars.length > 0.7) {
            return detected(line);
        }
    }
    return NOT_FOUND;
}

export function detectEmail(text: string): Detection {
    const match = EMAIL_PATTERN.exec(text);
    return match ? detected(match[0]) : NOT_FOUND;
}

export function detectPhone(text: string, patterns: readonly RegExp[]): Detection {
    for (const pattern of patterns) {
        const match = pattern.exec(text);
        if (match) {
            return detected(match[0]);
        }
    }
    return NOT_FOUND;
}

export function detectLocation(lines: readonly string[], gazetteer: readonly string[]): Detection {
    const byPlace = lines.find((line) => {
        const lower = line.toLowerCase();
        return charLength(line) < 80 && gazetteer.some((place) => lower.includes(place));
    });
    if (byPlace !== undefined) {
        return detected(byPlace);
    }

    // 回退：前几行中带逗号的地址样式行
    const byComma = lines
        .slice(0, LOCATION_FALLBACK_SCAN_LINES)
        .find((line) => line.includes(',') && LETTER.test(line));
    return byComma !== undefined ? detected(byComma) : NOT_FOUND;
}

function withScheme(url: string): string {
    return url.toLowerCase().startsWith('http') ? url : `https://${url}`;
}

/**
 * 匹配 linkedin.com / github.com 之类的个人主页链接
 */
export function detectProfileLink(text: string, host: string): Detection {
    const match = new RegExp(`${escapeRegExp(host)}\\S*`, 'i').exec(text);
    return match ? detected(withScheme(match[0])) : NOT_FOUND;
}

export function detectWebsite(text: string, excludedHosts: readonly string[]): Detection {
    for (const match of text.matchAll(WEBSITE_PATTERN)) {
        const url = match[0];
        const lower = url.toLowerCase();
        if (!excludedHosts.some((host) => lower.includes(host))) {
            return detected(withScheme(url));
        }
    }
    return NOT_FOUND;
}

export function detectLabelledValue(lines: readonly string[], label: RegExp): Detection {
    for (const line of lines) {
        const match = label.exec(line);
        const value = match?.[1]?.trim();
        if (value) {
            return detected(value);
        }
    }
    return NOT_FOUND;
}

export function detectSoftSkills(text: string, vocabulary: readonly string[]): Detection {
    const found = vocabulary.filter((term) => {
        const source = term
            .split(/[\s-]+/)
            .map(escapeRegExp)
            .join('[\\s-]+');
        return new RegExp(`\\b${source}\\b`, 'i').test(text);
    });
    return found.length > 0 ? detected(truncateChars(found.join(', '), 300)) : NOT_FOUND;
}

export function detectTitle(lines: readonly string[], keywords: readonly string[]): Detection {
    const line = lines
        .slice(0, TITLE_SCAN_LINES)
        .find((candidate) => {
            const lower = candidate.toLowerCase();
            return charLength(candidate) < 100 && keywords.some((keyword) => lower.includes(keyword));
        });
    return line !== undefined ? detected(line) : NOT_FOUND;
}

/**
 * 没有职位行时，根据技能文本猜测一个笼统的头衔
 */
export function inferTitleFromSkills(skills: string): string {
    const lower = skills.toLowerCase();
    if (lower.includes('data')) {
        return 'Data Professional';
    }
    if (lower.includes('python')) {
        return 'Software Developer';
    }
    return 'Professional';
}

export function splitSkillTokens(text: string): string[] {
    return text
        .split(SKILL_DELIMITERS)
        .map((token) => token.trim())
        .filter((token) => charLength(token) > 2 && charLength(token) < 80);
}

/**
 * 简历文本启发式字段提取器
 * 各检测阶段相互独立，均为"文档顺序第一个命中者胜出"
 */
export class FieldExtractor {
    constructor(private readonly catalog: ExtractionCatalog = DEFAULT_CATALOG) {}

    extract(text: string): ExtractedFields {
        const result = createDefaultFields();

        const lines = splitLines(text);
        if (lines.length === 0) {
            return result;
        }

        const { catalog } = this;

        result.fullname = valueOr(detectName(lines, catalog.nameSkipMarkers), result.fullname);
        result.email = valueOr(detectEmail(text), '');
        result.phone = valueOr(detectPhone(text, catalog.phonePatterns), '');
        result.location = valueOr(detectLocation(lines, catalog.gazetteer), '');
        result.linkedin = valueOr(detectProfileLink(text, 'linkedin.com'), '');
        result.github = valueOr(detectProfileLink(text, 'github.com'), '');

        const positions = locateHeaders(lines, catalog.sections);
        const section = (field: SectionField): string[] =>
            sliceSection(lines, positions, field, this.maxLines(field), catalog.paginationPattern);

        const summaryLines = section('summary');
        if (summaryLines.length > 0) {
            result.summary = capped(summaryLines, ' ', 1000);
            if (lines.some((line) => catalog.careerObjectivePattern.test(line))) {
                result.career_objective = result.summary;
            }
        }

        const skillsLines = section('skills');
        if (skillsLines.length > 0) {
            const tokens = splitSkillTokens(skillsLines.join(' '));
            result.skills = truncateChars(tokens.slice(0, MAX_SKILLS).join(', '), 500);
        }

        let experienceLines = section('experience');
        if (experienceLines.length === 0) {
            experienceLines = this.experienceFallback(lines);
        }
        result.experience = capped(experienceLines, '\n', 1500);

        let educationLines = section('education');
        if (educationLines.length === 0) {
            educationLines = this.educationFallback(lines);
        }
        result.education = capped(educationLines, '\n', 1000);

        result.projects = capped(section('projects'), '\n', 800);
        result.certifications = capped(section('certifications'), '\n', 800);
        result.languages = capped(section('languages'), ', ', 300);
        result.awards = capped(section('awards'), '\n', 500);

        const title = detectTitle(lines, catalog.titleKeywords);
        result.title = title.found ? title.value : inferTitleFromSkills(result.skills);

        result.website = valueOr(detectWebsite(text, ['linkedin.com', 'github.com']), '');
        const dob = detectLabelledValue(lines, DOB_PATTERN);
        result.dob = dob.found ? normalizeDate(dob.value) : '';
        result.nationality = valueOr(detectLabelledValue(lines, NATIONALITY_PATTERN), '');
        result.softskills = valueOr(detectSoftSkills(text, catalog.softSkills), '');

        this.logSummary(lines.length, positions, result);

        return result;
    }

    private maxLines(field: SectionField): number {
        return this.catalog.sections.find((rule) => rule.field === field)?.maxLines ?? 0;
    }

    // 没有经历标题时：取第一处提到 experience 的短行之后的若干行
    private experienceFallback(lines: readonly string[]): string[] {
        const index = lines.findIndex((line) => line.toLowerCase().includes('experience') && charLength(line) < 70);
        if (index === -1) {
            return [];
        }
        return lines.slice(index + 1, index + 1 + EXPERIENCE_FALLBACK_LINES);
    }

    // 没有教育标题时：收集所有包含学位关键词的行
    private educationFallback(lines: readonly string[]): string[] {
        const { degreeKeywords } = this.catalog;
        return lines.filter((line) => {
            const lower = line.toLowerCase();
            return degreeKeywords.some((keyword) => lower.includes(keyword));
        });
    }

    private logSummary(lineCount: number, positions: SectionPositions, result: ExtractedFields): void {
        logger.debug('简历字段提取完成', {
            lines: lineCount,
            sections: Object.fromEntries(positions),
            filled: RESUME_FIELDS.filter((field) => result[field] !== '')
        });
    }
}

export const resumeFieldExtractor = new FieldExtractor();

export function extractResumeFields(text: string): ExtractedFields {
    return resumeFieldExtractor.extract(text);
}
