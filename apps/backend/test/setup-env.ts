import 'reflect-metadata';

process.env.NODE_ENV = 'test';
process.env.DATABASE_PATH = ':memory:';
process.env.JWT_SECRET_KEY = 'test-secret-key-for-jest-runs';
process.env.JWT_ALGORITHM = 'HS256';
process.env.JWT_EXPIRATION_MINUTES = '30';
process.env.JWT_REFRESH_EXPIRATION_DAYS = '1';
process.env.PASSWORD_HASH_MEMORY_COST = '4096';
process.env.PASSWORD_HASH_TIME_COST = '2';
process.env.LOG_LEVEL = 'error';
