const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True for a real calendar date written as YYYY-MM-DD.
 */
export function isIsoDate(value: string): boolean {
    if (!ISO_DATE_RE.test(value)) return false;
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

/**
 * Today's local date as YYYY-MM-DD.
 */
export function todayIso(now: Date = new Date()): string {
    const month = String(now.getMonth() + 1).padStart(2, '0');
    const day = String(now.getDate()).padStart(2, '0');
    return `${now.getFullYear()}-${month}-${day}`;
}

/**
 * Whether an ISO date falls in the half-open range [since, before).
 * Either bound may be omitted. ISO dates compare correctly as strings.
 */
export function inDateRange(date: string, since?: string, before?: string): boolean {
    if (since !== undefined && date < since) return false;
    if (before !== undefined && date >= before) return false;
    return true;
}
