import { NamedPattern, SectionRule } from '../config/extractionCatalog';
import { SectionField } from '../types/resume';
import { charLength } from '../utils/text';

export type SectionPositions = ReadonlyMap<SectionField, number>;

// 短于该长度的内容行视为噪声（页眉、分隔符等）
const MIN_CONTENT_LINE_LENGTH = 10;

const DEFAULT_PAGINATION_PATTERN = /^page\s+\d+/i;

/**
 * 返回第一个命中该行的标题模式
 */
export function matchHeader(line: string, patterns: readonly NamedPattern[]): NamedPattern | undefined {
    return patterns.find(({ pattern }) => pattern.test(line));
}

/**
 * 定位各章节标题所在的行号
 * 每个字段只记录文档中第一处命中；不同字段可以落在同一行
 */
export function locateHeaders(lines: readonly string[], rules: readonly SectionRule[]): Map<SectionField, number> {
    const positions = new Map<SectionField, number>();

    for (const rule of rules) {
        const index = lines.findIndex((line) => matchHeader(line, rule.patterns) !== undefined);
        if (index !== -1) {
            positions.set(rule.field, index);
        }
    }

    return positions;
}

/**
 * 截取某个章节的内容行
 * 结束位置取所有其他标题中行号严格大于本标题的最近一个，再受 maxLines 限制
 */
export function sliceSection(
    lines: readonly string[],
    positions: SectionPositions,
    field: SectionField,
    maxLines: number,
    paginationPattern: RegExp = DEFAULT_PAGINATION_PATTERN
): string[] {
    const header = positions.get(field);
    if (header === undefined) {
        return [];
    }

    const start = header + 1;
    let end = lines.length;

    for (const [other, position] of positions) {
        if (other !== field && position > header && position < end) {
            end = position;
        }
    }

    end = Math.min(end, start + maxLines);

    return lines
        .slice(start, end)
        .filter((line) => charLength(line) >= MIN_CONTENT_LINE_LENGTH && !paginationPattern.test(line));
}
