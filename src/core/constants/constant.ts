export const IS_PUBLIC_KEY = 'isPublic';
export const SKIP_RATE_LIMIT_KEY = 'skipRateLimit';
