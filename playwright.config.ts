import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig, devices } from '@playwright/test';
import dotenv from 'dotenv';

const projectRoot = path.dirname(fileURLToPath(import.meta.url));

dotenv.config({ path: path.join(projectRoot, '.env.local'), override: true });

// Suite artifacts are written per run by the executor, which points us at its root.
const artifactsRoot = path.resolve(projectRoot, process.env.SUITE_ARTIFACTS_ROOT ?? 'tests/artifacts/runs');

const extraChromeArgs = (process.env.PW_EXTRA_CHROME_ARGS ?? '')
  .split(/\s+/)
  .filter(Boolean);

export default defineConfig({
  testDir: artifactsRoot,
  testMatch: /.*\.spec\.(ts|js)/,
  reporter: [['list']],
  timeout: 60 * 1000,
  expect: {
    timeout: 10 * 1000,
  },
  use: {
    baseURL: process.env.E2E_BASE_URL ?? 'http://localhost:4200',
    trace: 'on-first-retry',
    screenshot: 'only-on-failure',
    actionTimeout: 15 * 1000,
    launchOptions: {
      args: extraChromeArgs,
      executablePath: process.env.PW_CHROME_PATH,
    },
  },
  projects: [
    {
      name: 'chromium',
      use: { ...devices['Desktop Chrome'] },
    },
  ],
  retries: process.env.CI ? 1 : 0,
});
