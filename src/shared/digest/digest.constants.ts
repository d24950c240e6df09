export const DIGEST_TIME_ZONE = 'Asia/Tokyo';

/** 06:00, 14:00 and 22:00 in DIGEST_TIME_ZONE */
export const DIGEST_CRON = '0 6,14,22 * * *';

export const DIGEST_JOB_NAME = 'daily-digest';
