/**
 * Clipboard access through the platform's paste utilities.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

interface ClipboardTool {
    command: string;
    args: string[];
}

// Tried in order: macOS, Wayland, X11
const CLIPBOARD_TOOLS: readonly ClipboardTool[] = [
    { command: 'pbpaste', args: [] },
    { command: 'wl-paste', args: [] },
    { command: 'xclip', args: ['-selection', 'clipboard', '-o'] },
];

function isMissingCommand(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the clipboard text.
 * Tools that are not installed are skipped; when every installed tool fails,
 * the last failure is thrown.
 * @throws Error when no clipboard utility is installed
 */
export async function readClipboard(): Promise<string> {
    let lastError: Error | undefined;

    for (const tool of CLIPBOARD_TOOLS) {
        try {
            const { stdout } = await execFileAsync(tool.command, tool.args, { encoding: 'utf-8' });
            return stdout;
        } catch (error) {
            if (isMissingCommand(error)) continue;
            const message = error instanceof Error ? error.message : String(error);
            lastError = new Error(`${tool.command}: ${message}`, { cause: error });
        }
    }

    if (lastError) throw lastError;
    throw new Error(
        `No clipboard utility found (tried ${CLIPBOARD_TOOLS.map(tool => tool.command).join(', ')})`
    );
}
