// 按码点而不是 UTF-16 单元计算长度，避免把代理对截成两半

export function charLength(value: string): number {
    return Array.from(value).length;
}

export function truncateChars(value: string, maxChars: number): string {
    return charLength(value) <= maxChars ? value : Array.from(value).slice(0, maxChars).join('');
}
