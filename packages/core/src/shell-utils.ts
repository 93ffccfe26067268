/**
 * Shell Utilities - Safe command construction
 *
 * Every user-supplied value that reaches a shell goes through shellEscape.
 */

/**
 * Escape a string for safe use in shell commands.
 *
 * Uses POSIX single-quote escaping: wraps the string in single quotes
 * and writes each embedded single quote as '\'' (end quote, escaped quote, start quote).
 * Inside single quotes nothing but the closing quote is special.
 *
 * @example
 * ```typescript
 * shellEscape("feature/login")   // "'feature/login'"
 * shellEscape("it's")            // "'it'\\''s'"
 * shellEscape("$(rm -rf /)")     // "'$(rm -rf /)'"
 * ```
 */
export function shellEscape(str: string): string {
    return "'" + str.replace(/'/g, "'\\''") + "'";
}

/**
 * Build a command line from a program, its fixed flags and escaped operands.
 *
 * Flags are trusted literals written in this codebase; operands are user data.
 *
 * @example
 * ```typescript
 * buildCommand('git fetch', ['origin', 'feature/x'])
 * // "git fetch 'origin' 'feature/x'"
 * ```
 */
export function buildCommand(base: string, operands: readonly string[]): string {
    if (operands.length === 0) {
        return base;
    }
    return `${base} ${operands.map(shellEscape).join(' ')}`;
}
