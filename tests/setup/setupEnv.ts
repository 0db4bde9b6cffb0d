process.env.NODE_ENV = 'test';
process.env.PERSISTENCE_DRIVER = 'memory';
process.env.LOG_LEVEL = 'silent';
process.env.JWT_SECRET = 'test-secret';
process.env.WEATHER_REFRESH_ENABLED = 'false';
process.env.WEATHER_API_URL = 'http://127.0.0.1:9/v1/forecast';
process.env.WEATHER_MAX_ATTEMPTS = '1';
process.env.WEATHER_BACKOFF_MS = '0';
process.env.EVENT_BUS_DRIVER = 'in-memory';
process.env.DEFAULT_ADMIN_EMAIL = 'admin@example.com';
process.env.DEFAULT_ADMIN_PASSWORD = 'Admin-pass1';
process.env.RATE_LIMIT_WINDOW_SECONDS = '20';
process.env.RATE_LIMIT_MAX_REQUESTS = '10';
