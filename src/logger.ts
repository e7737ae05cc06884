import pino from 'pino';

// Always stderr: stdout belongs to the MCP stdio transport when running as a server.
export const logger = pino(
  {
    name: 'samtools-dispatch',
    level: process.env['LOG_LEVEL'] ?? 'info',
  },
  pino.destination(2),
);
