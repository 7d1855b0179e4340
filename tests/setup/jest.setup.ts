// Quiet pino unless a test run asks for logs explicitly.
process.env.LOG_LEVEL ??= 'silent';
process.env.NODE_ENV = 'test';
