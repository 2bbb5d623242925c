export const RATE_LIMIT_ALLOWLIST = ['127.0.0.1', '::1'];

export const WEBHOOK_RATE_LIMIT = {
  max: 60,
  timeWindow: '1 minute'
};
