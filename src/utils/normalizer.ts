export function cleanText(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
}

export function slugify(value: string): string {
    return cleanText(value)
        .toLowerCase()
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

/**
 * Listing id: the detail URL's last path segment, or an address slug when the
 * row has no URL. Must stay deterministic, resume depends on it.
 */
export function deriveSourceId(fields: { detailUrl?: string; street: string; city: string; state: string; zip: string }): string {
    if (fields.detailUrl) {
        try {
            const segments = new URL(fields.detailUrl).pathname.split('/').filter(Boolean);
            const last = segments[segments.length - 1];
            if (last) return last.toLowerCase();
        } catch {
            // not an absolute URL, fall through to the address slug
        }
    }
    return slugify([fields.street, fields.city, fields.state, fields.zip].join(' '));
}

/** Empty values and a bare "#" placeholder mean no unit. */
export function normalizeSuite(value: string | undefined): string | undefined {
    if (value === undefined) return undefined;
    const cleaned = cleanText(value);
    if (cleaned === '' || cleaned === '#') return undefined;
    return cleaned;
}
