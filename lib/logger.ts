import pino from 'pino';

// Shared logger. Level comes from LOG_LEVEL so the CLI and tests can tune it.
const logger = pino({
  name: 'fqdn-checker',
  level: process.env.LOG_LEVEL || 'info',
});

export default logger;
