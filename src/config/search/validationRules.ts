export const WEBHOOK_RULES = {
  queryMaxLength: 500,
  tagMaxLength: 200
} as const;
