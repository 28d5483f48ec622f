import 'dotenv/config';

const DEFAULT_BODY_LIMIT = 1024 * 1024;

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  // strings are analyzed in full, so cap what a single POST can carry
  bodyLimitBytes: parseInt(process.env.BODY_LIMIT_BYTES || String(DEFAULT_BODY_LIMIT), 10),
};
