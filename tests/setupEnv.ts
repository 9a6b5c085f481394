import os from 'os';
import path from 'path';

// Vitest bootstraps before app/config imports.
// Keep report artifacts out of the working tree.
if (!process.env.REPORTS_TEMP_DIR) {
  process.env.REPORTS_TEMP_DIR = path.join(os.tmpdir(), `discrepancy-report-tests-${process.pid}`);
}

// Avoid rate limiting interfering with automated tests.
if (!process.env.ENABLE_RATE_LIMIT) {
  process.env.ENABLE_RATE_LIMIT = 'false';
}

// Small enough that the oversized-upload test stays cheap.
if (!process.env.MAX_UPLOAD_SIZE_MB) {
  process.env.MAX_UPLOAD_SIZE_MB = '1';
}

if (!process.env.CRON_ENABLED) {
  process.env.CRON_ENABLED = 'false';
}

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}
