/**
 * Environment for the test run; loaded before any module reads Settings
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'ERROR';
process.env.LOG_TO_FILE = 'false';
process.env.DATABASE_PATH = ':memory:';
process.env.SESSION_SECRET = 'test-secret';
process.env.BCRYPT_ROUNDS = '4';
process.env.NO_COLOR = '1';
