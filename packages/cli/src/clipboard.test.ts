/**
 * Tests for clipboard access
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockExecFileAsync } = vi.hoisted(() => ({ mockExecFileAsync: vi.fn() }));

vi.mock('child_process', () => ({
    execFile: vi.fn(),
}));

vi.mock('util', () => ({
    promisify: () => mockExecFileAsync,
}));

const { readClipboard } = await import('./clipboard.js');

function missing(command: string): Error {
    return Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
}

describe('readClipboard', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('returns the output of the first installed tool', async () => {
        mockExecFileAsync.mockResolvedValueOnce({ stdout: 'jane/42-login\n', stderr: '' });

        await expect(readClipboard()).resolves.toBe('jane/42-login\n');
        expect(mockExecFileAsync).toHaveBeenCalledTimes(1);
        expect(mockExecFileAsync).toHaveBeenCalledWith('pbpaste', [], { encoding: 'utf-8' });
    });

    it('skips tools that are not installed', async () => {
        mockExecFileAsync
            .mockRejectedValueOnce(missing('pbpaste'))
            .mockRejectedValueOnce(missing('wl-paste'))
            .mockResolvedValueOnce({ stdout: 'jane/7-fix', stderr: '' });

        await expect(readClipboard()).resolves.toBe('jane/7-fix');
        expect(mockExecFileAsync).toHaveBeenLastCalledWith('xclip', ['-selection', 'clipboard', '-o'], {
            encoding: 'utf-8',
        });
    });

    it('fails naming every tool when none is installed', async () => {
        mockExecFileAsync
            .mockRejectedValueOnce(missing('pbpaste'))
            .mockRejectedValueOnce(missing('wl-paste'))
            .mockRejectedValueOnce(missing('xclip'));

        await expect(readClipboard()).rejects.toThrow(
            'No clipboard utility found (tried pbpaste, wl-paste, xclip)'
        );
    });

    it('reports the last failure of an installed tool', async () => {
        mockExecFileAsync
            .mockRejectedValueOnce(missing('pbpaste'))
            .mockRejectedValueOnce(new Error('No selection'))
            .mockRejectedValueOnce(missing('xclip'));

        await expect(readClipboard()).rejects.toThrow('wl-paste: No selection');
    });
});
