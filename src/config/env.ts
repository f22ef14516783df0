import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Site
  REGULATIONS_BASE_URL: process.env.REGULATIONS_BASE_URL || 'https://regulations.justia.com',
  NAVIGATION_SELECTOR: process.env.NAVIGATION_SELECTOR || '.codes-listing',
  USER_AGENT: process.env.USER_AGENT,

  // Output
  OUTPUT_DIR: process.env.OUTPUT_DIR || 'regs',

  // Crawl
  WORKER_COUNT: parseInt(process.env.WORKER_COUNT || '1', 10),
  MAX_DEPTH: parseInt(process.env.MAX_DEPTH || '20', 10),

  // Resilience
  MAX_RETRIES: parseInt(process.env.MAX_RETRIES || '3', 10),
  RETRY_BACKOFF_BASE: parseInt(process.env.RETRY_BACKOFF_BASE || '1000', 10),
  RETRY_BACKOFF_MAX: parseInt(process.env.RETRY_BACKOFF_MAX || '60000', 10), // 1 minute cap
  REQUEST_DELAY: parseInt(process.env.REQUEST_DELAY || '100', 10), // pacing before every request
  REQUEST_TIMEOUT: parseInt(process.env.REQUEST_TIMEOUT || '30000', 10),

  // Verification
  SPOT_CHECK_SAMPLES: parseInt(process.env.SPOT_CHECK_SAMPLES || '10', 10),
  SPOT_CHECK_MAX_RETRIES: parseInt(process.env.SPOT_CHECK_MAX_RETRIES || '2', 10),
  CONTENT_MIN_LENGTH: parseInt(process.env.CONTENT_MIN_LENGTH || '50', 10),
  CONTENT_SHORT_LIMIT: parseInt(process.env.CONTENT_SHORT_LIMIT || '500', 10),
  CONTENT_SHORT_CHUNK_SIZE: parseInt(process.env.CONTENT_SHORT_CHUNK_SIZE || '50', 10),
  CONTENT_MATCH_SHORT_RATIO: parseFloat(process.env.CONTENT_MATCH_SHORT_RATIO || '0.8'),
  CONTENT_CHUNK_COUNT: parseInt(process.env.CONTENT_CHUNK_COUNT || '20', 10),
  CONTENT_CHUNK_SIZE: parseInt(process.env.CONTENT_CHUNK_SIZE || '100', 10),
  CONTENT_MATCH_CHUNK_RATIO: parseFloat(process.env.CONTENT_MATCH_CHUNK_RATIO || '0.6'),
} as const;

export default env;
