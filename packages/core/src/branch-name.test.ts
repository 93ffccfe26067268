import { describe, it, expect } from 'vitest';
import { extractBranchName, validateClipboardBranch, CLIPBOARD_BRANCH_MESSAGES } from './branch-name.js';

describe('extractBranchName', () => {
    it('takes the first non-blank line', () => {
        expect(extractBranchName('\n\n  jane/42-login  \nsecond line\n')).toBe('jane/42-login');
    });

    it('strips surrounding quotes', () => {
        expect(extractBranchName('"jane/42-login"')).toBe('jane/42-login');
        expect(extractBranchName("'jane/42-login'\n")).toBe('jane/42-login');
    });

    it('handles CRLF line endings', () => {
        expect(extractBranchName('jane/7-fix\r\nother')).toBe('jane/7-fix');
    });

    it('returns an empty string for blank input', () => {
        expect(extractBranchName('  \n\t\n')).toBe('');
        expect(extractBranchName('""')).toBe('');
    });
});

describe('validateClipboardBranch', () => {
    it('accepts owner/ticket style names', () => {
        expect(validateClipboardBranch('jane/42-login')).toBeNull();
    });

    it('checks the rules in order', () => {
        expect(validateClipboardBranch('')).toBe('empty');
        expect(validateClipboardBranch('login fix')).toBe('missing-slash');
        expect(validateClipboardBranch('jane/login fix')).toBe('missing-number');
        expect(validateClipboardBranch('jane/42 login')).toBe('whitespace');
        expect(validateClipboardBranch('jane/42\tlogin')).toBe('whitespace');
    });

    it('has a message for every rule', () => {
        expect(CLIPBOARD_BRANCH_MESSAGES['missing-slash']).toBe(
            "Clipboard branch must contain a '/' (e.g. owner/feature)"
        );
        expect(Object.keys(CLIPBOARD_BRANCH_MESSAGES)).toEqual([
            'empty',
            'missing-slash',
            'missing-number',
            'whitespace',
        ]);
    });
});
