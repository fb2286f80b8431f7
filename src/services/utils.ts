export function sanitizeFileComponent(name?: string | null, fallback = 'video', limit = 80): string {
    if (!name) return fallback;
    const sanitized = name
        .trim()
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/[^\w\-.]+/g, '_')
        .replace(/^[_.]+|[_.]+$/g, '')
        .slice(0, limit);
    return sanitized || fallback;
}

export function isValidHttpUrl(value: string): boolean {
    try {
        const parsed = new URL(value);
        return ['http:', 'https:'].includes(parsed.protocol);
    } catch {
        return false;
    }
}
