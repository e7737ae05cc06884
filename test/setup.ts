// Keep pino quiet in test output; tests that care about logging set their own level.
process.env['LOG_LEVEL'] = 'silent';
