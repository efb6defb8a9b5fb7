import { format, isValid, parse } from 'date-fns';
import { ExtractedFields, RESUME_FIELDS, ResumeField } from '../types/resume';

// 支持的日期写法（日在前的数字格式优先）
const DATE_FORMATS = [
    'yyyy-MM-dd',
    'd/M/yyyy',
    'd-M-yyyy',
    'd.M.yyyy',
    'd MMMM yyyy',
    'd MMM yyyy',
    'MMMM d, yyyy',
    'MMM d, yyyy',
    'MMMM d yyyy',
    'MMM d yyyy'
];

const REFERENCE_DATE = new Date(2000, 0, 1);
const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

const BULLET_PREFIX = /^(?:[•●▪◦■►➢✓*\-–—]\s*)+/;
const CATEGORY_PATTERN = /^([^:,]{1,40}):\s*(.*)$/;
const SKILL_ITEM_DELIMITERS = /[,•|]/;
const LIST_ITEM_DELIMITERS = /[,;|•\r\n]+/;
const SOFT_SKILLS_LABEL = /^\s*(?:soft\s*skills?\s*[:\-–]\s*)+/i;
const LANGUAGES_LABEL = /^\s*(?:languages?(?:\s+(?:known|spoken))?\s*[:\-–]\s*)+/i;
const LANGUAGE_LEVEL = /^(.+?)\s*(?:[-–—:]|\()\s*(.+?)\s*\)?$/;

/**
 * 将自由格式的日期统一为 yyyy-MM-dd；无法识别时原样返回（去除首尾空白）
 */
export function normalizeDate(value: string): string {
    const trimmed = value.trim();
    if (!trimmed) {
        return '';
    }

    const text = trimmed.replace(/\s+/g, ' ');
    for (const pattern of DATE_FORMATS) {
        const date = parse(text, pattern, REFERENCE_DATE);
        if (isValid(date) && date.getFullYear() >= MIN_YEAR && date.getFullYear() <= MAX_YEAR) {
            return format(date, 'yyyy-MM-dd');
        }
    }

    return trimmed;
}

function cleanItem(item: string): string {
    return item.replace(/\s+/g, ' ').trim().replace(BULLET_PREFIX, '').trim();
}

function splitItems(text: string, delimiters: RegExp): string[] {
    return text
        .split(delimiters)
        .map(cleanItem)
        .filter((item) => item.length > 0);
}

// 忽略大小写去重，保留第一次出现的写法
function dedupe(items: readonly string[]): string[] {
    const seen = new Set<string>();
    return items.filter((item) => {
        const key = item.toLowerCase();
        if (seen.has(key)) {
            return false;
        }
        seen.add(key);
        return true;
    });
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

interface SkillGroup {
    category: string;
    items: string[];
}

function addToGroup(groups: SkillGroup[], category: string, items: readonly string[]): void {
    const existing = groups.find((group) => group.category.toLowerCase() === category.toLowerCase());
    if (existing) {
        existing.items.push(...items);
    } else {
        groups.push({ category, items: [...items] });
    }
}

// 返回分类名和条目；不是 "分类: 条目" 形式时返回 undefined
function matchCategory(text: string): { category: string; rest: string } | undefined {
    const match = CATEGORY_PATTERN.exec(text);
    const category = match ? cleanItem(match[1]) : '';
    return match && category ? { category, rest: match[2] } : undefined;
}

function parseSkillGroups(value: string): { plain: string[]; groups: SkillGroup[] } {
    const plain: string[] = [];
    const groups: SkillGroup[] = [];

    for (const segment of value.split(/[;\r\n]+/)) {
        const trimmed = segment.trim();
        if (!trimmed) {
            continue;
        }

        const tagged = matchCategory(trimmed);
        if (tagged) {
            addToGroup(groups, tagged.category, splitItems(tagged.rest, SKILL_ITEM_DELIMITERS));
            continue;
        }

        // 前面带分隔符的 "分类: 条目" 同样归入对应分类
        for (const item of splitItems(trimmed, SKILL_ITEM_DELIMITERS)) {
            const inline = matchCategory(item);
            if (inline) {
                addToGroup(groups, inline.category, splitItems(inline.rest, SKILL_ITEM_DELIMITERS));
            } else {
                plain.push(item);
            }
        }
    }

    return { plain, groups };
}

/**
 * 技能列表中的全部条目（不含分类名）
 */
export function parseSkillList(value: string): string[] {
    const { plain, groups } = parseSkillGroups(value);
    return dedupe([...plain, ...groups.flatMap((group) => group.items)]);
}

/**
 * 技能统一为 "a, b; 分类: c, d" 形式
 */
export function normalizeSkills(value: string): string {
    const { plain, groups } = parseSkillGroups(value);
    const parts: string[] = [];

    const plainItems = dedupe(plain);
    if (plainItems.length > 0) {
        parts.push(plainItems.join(', '));
    }

    for (const group of groups) {
        const items = dedupe(group.items);
        if (items.length > 0) {
            parts.push(`${group.category}: ${items.join(', ')}`);
        }
    }

    return parts.join('; ');
}

export function normalizeSoftSkills(value: string): string {
    return dedupe(splitItems(value.replace(SOFT_SKILLS_LABEL, ''), LIST_ITEM_DELIMITERS)).join(', ');
}

/**
 * 语言统一为 "English (Native), Hindi" 形式
 */
export function normalizeLanguagesSpoken(value: string): string {
    const seen = new Set<string>();
    const languages: string[] = [];

    for (const item of splitItems(value.replace(LANGUAGES_LABEL, ''), LIST_ITEM_DELIMITERS)) {
        const match = LANGUAGE_LEVEL.exec(item);
        const name = capitalize(match ? match[1].trim() : item);
        const key = name.toLowerCase();
        if (seen.has(key)) {
            continue;
        }
        seen.add(key);
        languages.push(match ? `${name} (${capitalize(match[2].trim())})` : name);
    }

    return languages.join(', ');
}

/**
 * 多行文本段落（经历、教育、项目等）整理：
 * 统一项目符号为 "- "，小写开头的折行并入上一行，连续空行合并为一行
 */
export function normalizeBlockSection(value: string): string {
    const output: string[] = [];

    for (const raw of value.split(/\r\n|\r|\n/)) {
        const line = raw.replace(/[ \t\u00A0]+/g, ' ').trim();
        const last = output.length > 0 ? output[output.length - 1] : undefined;

        if (!line) {
            if (last !== undefined && last !== '') {
                output.push('');
            }
            continue;
        }

        if (BULLET_PREFIX.test(line)) {
            const body = line.replace(BULLET_PREFIX, '').trim();
            if (body) {
                output.push(`- ${body}`);
            }
            continue;
        }

        if (/^\p{Ll}/u.test(line) && last !== undefined && last !== '') {
            output[output.length - 1] = `${last} ${line}`;
            continue;
        }

        output.push(line);
    }

    while (output.length > 0 && output[output.length - 1] === '') {
        output.pop();
    }

    return output.join('\n');
}

export function normalizeParagraph(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
}

const FIELD_NORMALIZERS: Partial<Record<ResumeField, (value: string) => string>> = {
    dob: normalizeDate,
    summary: normalizeParagraph,
    career_objective: normalizeParagraph,
    skills: normalizeSkills,
    softskills: normalizeSoftSkills,
    languages: normalizeLanguagesSpoken,
    experience: normalizeBlockSection,
    education: normalizeBlockSection,
    projects: normalizeBlockSection,
    certifications: normalizeBlockSection,
    awards: normalizeBlockSection
};

/**
 * 单个字段的规范化；导入评分和用户编辑保存共用
 */
export function normalizeField(field: ResumeField, value: string): string {
    const normalizer = FIELD_NORMALIZERS[field];
    return normalizer ? normalizer(value) : value.trim();
}

export function normalizeResumeEdits(edits: Partial<ExtractedFields>): Partial<ExtractedFields> {
    const normalized: Partial<ExtractedFields> = {};
    for (const field of RESUME_FIELDS) {
        const value = edits[field];
        if (value !== undefined) {
            normalized[field] = normalizeField(field, value);
        }
    }
    return normalized;
}

// 参与 ATS 评分的字段
export const ATS_SCORED_FIELDS = [
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
    'languages'
] as const satisfies readonly ResumeField[];

export type AtsScoredField = typeof ATS_SCORED_FIELDS[number];

/**
 * 评分前的预处理：只保留参与评分的字段并做规范化
 */
export function prepareForAts(fields: Partial<ExtractedFields>): Record<AtsScoredField, string> {
    const normalize = (field: AtsScoredField): string => normalizeField(field, fields[field] ?? '');
    return {
        fullname: normalize('fullname'),
        email: normalize('email'),
        phone: normalize('phone'),
        location: normalize('location'),
        summary: normalize('summary'),
        skills: normalize('skills'),
        experience: normalize('experience'),
        education: normalize('education'),
        projects: normalize('projects'),
        certifications: normalize('certifications'),
        languages: normalize('languages')
    };
}
