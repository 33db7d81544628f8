import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.{ts,tsx}'],
    environment: 'node',
    env: {
      BCACHEFS_TUI_LOG_LEVEL: 'silent',
      BCACHEFS_TUI_LOG_FILE: path.join(os.tmpdir(), 'bcachefs-tui-test.log'),
    },
  },
});
