import pino, { type Logger } from 'pino';

/**
 * Pino logger instance configured for structured JSON logging to stderr.
 * The MCP stdio transport owns stdout, so logs must never go there.
 */
export const logger: Logger = pino(
  {
    name: 'mise-task-graph',
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label: string) => {
        return { level: label.toUpperCase() };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);
