/**
 * Escapes HTML special characters. Every tracker-supplied value goes through
 * this before it is placed in the report.
 */
export function escapeHtml(input: unknown): string {
    if (input === undefined || input === null) {
        return '';
    }
    return String(input)
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/**
 * Escapes HTML and converts newlines to <br> tags.
 */
export function escapeHtmlWithBreaks(input: unknown): string {
    return escapeHtml(input).replace(/\r?\n/g, '<br>');
}
