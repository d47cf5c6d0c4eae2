import pino from 'pino';

const logLevel = process.env.LOG_LEVEL || 'info';

/**
 * Structured logger shared by the server, the tools and the LLM client
 */
export const logger = pino({
  level: logLevel,
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
