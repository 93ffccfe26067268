/**
 * Branch names pasted from the clipboard.
 *
 * Ticket trackers copy names like `jane/1234-fix-login`, sometimes quoted,
 * sometimes followed by extra lines.
 */

/**
 * Take the first non-blank line, trimmed, without surrounding quotes.
 *
 * @example
 * extractBranchName('\n  "jane/42-login"\nsecond line')  // 'jane/42-login'
 */
export function extractBranchName(raw: string): string {
    const firstLine = raw
        .split(/\r?\n/)
        .map(line => line.trim())
        .find(line => line.length > 0);

    return stripQuotes(firstLine ?? raw.trim());
}

function stripQuotes(value: string): string {
    return value.replace(/^["']+|["']+$/g, '');
}

export type ClipboardBranchProblem = 'empty' | 'missing-slash' | 'missing-number' | 'whitespace';

/**
 * Check the naming rules a clipboard branch must follow, in order:
 * non-empty, has a `/`, has a digit, has no spaces or tabs.
 *
 * @returns The first rule broken, or null when the name is acceptable
 */
export function validateClipboardBranch(name: string): ClipboardBranchProblem | null {
    if (!name) return 'empty';
    if (!name.includes('/')) return 'missing-slash';
    if (!/\d/.test(name)) return 'missing-number';
    if (/[ \t]/.test(name)) return 'whitespace';
    return null;
}

/**
 * Human-readable explanation for each rule.
 */
export const CLIPBOARD_BRANCH_MESSAGES: Record<ClipboardBranchProblem, string> = {
    empty: 'Clipboard does not contain a branch name',
    'missing-slash': "Clipboard branch must contain a '/' (e.g. owner/feature)",
    'missing-number': 'Clipboard branch must include a number (e.g. ticket id)',
    whitespace: "Clipboard branch cannot contain spaces; replace them with '-' if needed",
};
