// Default env vars for testing if not set
process.env.NODE_ENV = 'test';
process.env.MONGODB_URI = process.env.MONGODB_URI || 'mongodb://localhost:27017/quest-engine-test';
process.env.DEFAULT_TIMEZONE = 'UTC';
process.env.LOG_LEVEL = 'error';
