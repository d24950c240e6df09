import * as Joi from 'joi';

export const validationSchema = Joi.object({
  // Shared
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  HTTP_TIMEOUT_MS: Joi.number().min(1000).max(120000).default(30000),

  // Transcript retries
  MAX_RETRIES: Joi.number().integer().min(1).max(10).default(3),
  BACKOFF_FACTOR: Joi.number().min(1).max(5).default(2),
  RETRY_BASE_DELAY_SECONDS: Joi.number().min(0).default(5),
  RATE_LIMIT_WAIT_SECONDS: Joi.number().min(0).default(60),

  // Transcript cache
  CACHE_DIR: Joi.string().default('.cache'),
  CACHE_EXPIRY_DAYS: Joi.number().min(0).default(7),

  // Transcript languages
  TRANSCRIPT_LANGUAGES: Joi.string().default('ja,en'),
  TRANSCRIPT_ANY_LANGUAGE_FALLBACK: Joi.boolean().default(true),
  COOKIES_FILE: Joi.string().optional(),

  // Proxy
  PROXY_ROTATION_ENABLED: Joi.boolean().default(true),
  PROXY_LIST_FILE: Joi.string().default('proxy_list.txt'),
  PROXY_SHUFFLE: Joi.boolean().default(true),
  PROXY_FAILURE_THRESHOLD: Joi.number().integer().min(1).default(3),
  PROXY_DISABLE_MINUTES: Joi.number().positive().default(30),
  WEBSHARE_API_TOKEN: Joi.string().optional(),

  // YouTube catalog
  YOUTUBE_API_KEY: Joi.string().required(),
  CHANNEL_IDS_FILE: Joi.string().default('channel_ids.txt'),
  TARGET_CHANNEL_IDS: Joi.string().allow('').default(''),
  LOOKBACK_HOURS: Joi.number().min(1).default(24),
  MIN_VIDEO_DURATION_SECONDS: Joi.number().min(0).default(61),

  // Gemini
  GEMINI_API_KEY: Joi.string().optional(),
  GEMINI_MODEL: Joi.string().default('gemini-2.0-flash'),
  DIGEST_TOPIC: Joi.string().default('generative AI'),

  // Mail
  EMAIL_HOST: Joi.string().default('smtp.gmail.com'),
  EMAIL_PORT: Joi.number().default(465),
  EMAIL_USER: Joi.string().required(),
  EMAIL_PASS: Joi.string().required(),
  EMAIL_RECIPIENT: Joi.string().required(),

  // Digest run
  PROCESSED_VIDEOS_FILE: Joi.string().default('processed_videos.txt'),
  MAX_VIDEOS: Joi.number().integer().min(1).default(50),
  INTER_VIDEO_DELAY_SECONDS: Joi.number().min(0).default(5),
});
