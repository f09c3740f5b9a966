import { describe, it, expect, afterEach } from 'vitest';
import * as colors from './colors.js';

describe('colors', () => {
  afterEach(() => {
    colors.setColorEnabled(true);
  });

  describe('with colors enabled', () => {
    it('wraps text in the SGR code for the style', () => {
      colors.setColorEnabled(true);
      expect(colors.paint('red', 'x')).toBe('\x1b[31mx\x1b[0m');
      expect(colors.paint('gray', 'x')).toBe('\x1b[90mx\x1b[0m');
      expect(colors.dim('x')).toBe('\x1b[2mx\x1b[0m');
    });

    it('colors the icon, and the text only for warnings and errors', () => {
      colors.setColorEnabled(true);
      expect(colors.status('success', 'done')).toBe('\x1b[32m✓\x1b[0m done');
      expect(colors.status('info', 'note')).toBe('\x1b[34mℹ\x1b[0m note');
      expect(colors.status('warning', 'careful')).toBe('\x1b[33m⚠\x1b[0m \x1b[33mcareful\x1b[0m');
      expect(colors.status('error', 'failed')).toBe('\x1b[31m✗\x1b[0m \x1b[31mfailed\x1b[0m');
    });
  });

  describe('with colors disabled', () => {
    it('returns plain text', () => {
      colors.setColorEnabled(false);
      expect(colors.bold(colors.cyan('x'))).toBe('x');
      expect(colors.paint('yellow', 'x')).toBe('x');
    });

    it('uses bracketed labels instead of icons', () => {
      colors.setColorEnabled(false);
      expect(colors.status('success', 'Commit created')).toBe('[OK] Commit created');
      expect(colors.status('warning', 'careful')).toBe('[WARN] careful');
      expect(colors.status('error', 'Commit cancelled')).toBe('[ERROR] Commit cancelled');
      expect(colors.status('info', 'note')).toBe('[INFO] note');
    });
  });
});
