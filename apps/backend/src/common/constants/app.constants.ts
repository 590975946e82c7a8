// Pagination
export const pagination = {
  DEFAULT_PAGE: 1,
  DEFAULT_LIMIT: 10,
  MAX_LIMIT: 100,
} as const;

// Account rules
export const accounts = {
  RESERVED_USERNAMES: ['admin', 'root', 'superuser', 'system', 'null'],
  DISPOSABLE_EMAIL_DOMAINS: [
    'mailinator.com',
    'yopmail.com',
    'tempmail.com',
    '10minutemail.com',
    'guerrillamail.com',
  ],
  MAX_EMAIL_LENGTH: 120,
} as const;

// Accepted plate formats: legacy (AAA0000) and Mercosul (AAA0A00)
export const plates = {
  LEGACY_PATTERN: /^[A-Z]{3}[0-9]{4}$/,
  MERCOSUL_PATTERN: /^[A-Z]{3}[0-9][A-Z][0-9]{2}$/,
} as const;

export const tokens = {
  TYPE: 'bearer',
} as const;
