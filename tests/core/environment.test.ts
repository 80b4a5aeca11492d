import { describe, it, expect } from 'vitest';

import { detectColor } from '../../src/core/environment.js';

describe('environment: detectColor', () => {

    const tty = { isTTY: true };

    it('should disable color when NO_COLOR is set', () => {

        expect(detectColor({ env: { NO_COLOR: '1' }, stream: tty, platform: 'linux' })).toBe(false);

    });

    it('should ignore an empty NO_COLOR', () => {

        expect(detectColor({ env: { NO_COLOR: '' }, stream: tty, platform: 'linux' })).toBe(true);

    });

    it('should disable color when the stream is not a terminal', () => {

        expect(detectColor({ env: {}, stream: { isTTY: false }, platform: 'linux' })).toBe(false);
        expect(detectColor({ env: {}, stream: {}, platform: 'darwin' })).toBe(false);

    });

    it('should enable color on a terminal outside Windows', () => {

        expect(detectColor({ env: {}, stream: tty, platform: 'linux' })).toBe(true);
        expect(detectColor({ env: {}, stream: tty, platform: 'darwin' })).toBe(true);

    });

    it('should need a known terminal on Windows', () => {

        expect(detectColor({ env: {}, stream: tty, platform: 'win32' })).toBe(false);
        expect(detectColor({ env: { WT_SESSION: 'abc' }, stream: tty, platform: 'win32' })).toBe(true);
        expect(detectColor({ env: { TERM_PROGRAM: 'vscode' }, stream: tty, platform: 'win32' })).toBe(true);
        expect(detectColor({ env: { ANSICON: '1' }, stream: tty, platform: 'win32' })).toBe(true);

    });

});
