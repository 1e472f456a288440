export const TEST_CONFIG: Record<string, unknown> = {
  NODE_ENV: 'test',
  APP_NAME: 'Supplier Compliance',
  JWT_SECRET: 'test-secret',
  JWT_REFRESH_SECRET: 'test-refresh-secret',
  JWT_ACCESS_EXPIRES_IN: '1h',
  JWT_REFRESH_EXPIRES_IN: '30d',
  MAGIC_LINK_BASE_URL: 'https://app.example.com',
  MAGIC_LINK_EXPIRY_MINUTES: 15,
  INVITATION_EXPIRY_HOURS: 168,
  MAGIC_LINK_RATE_LIMIT_MAX: 3,
  MAGIC_LINK_RATE_LIMIT_WINDOW_MINUTES: 60,
  NODEMAILER_FROM: 'no-reply@example.com',
  NODEMAILER_PORT: 587,
};

export const makeConfigService = (overrides: Record<string, unknown> = {}) => {
  const values: Record<string, unknown> = { ...TEST_CONFIG, ...overrides };
  return { get: jest.fn((key: string) => values[key]) };
};

/** Freezes `Date` only; promises and timers keep running normally. */
export const freezeTime = (iso: string) => {
  jest.useFakeTimers({
    now: new Date(iso),
    doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate', 'setTimeout', 'setInterval', 'clearTimeout', 'clearInterval', 'clearImmediate'],
  });
};

export const setTime = (iso: string) => {
  jest.setSystemTime(new Date(iso));
};
