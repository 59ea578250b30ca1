import { z } from 'zod';
import type { AddonModule } from '../types.js';

const RequestLoggerConfigSchema = z.object({
  /** Also log responses */
  responses: z.boolean().default(true),
});

/**
 * Logs every flow it sees; runs after the other default-priority hooks
 */
export const requestLogger: AddonModule = {
  manifest: {
    name: 'request-logger',
    displayName: 'Request Logger',
    version: '1.0.0',
    description: 'Logs requests and responses passing through the proxy',
    order: 1000,
    hooks: {
      request: { event: 'request-received', when: 'MATCH' },
      response: { event: 'response-received', when: 'MATCH' },
    },
    interceptRules: ['MATCH'],
  },
  configSchema: RequestLoggerConfigSchema,
  setup({ config }) {
    const { responses } = RequestLoggerConfigSchema.parse(config);

    return {
      handlers: {
        request: (event, { logger }) => {
          const { method, url } = event.attributes;
          logger.info(`${method ?? '-'} ${url ?? event.flowId}`);
        },
        response: (event, { logger }) => {
          if (!responses) return;
          const { statusCode, url } = event.attributes;
          logger.info(`${statusCode ?? '-'} ${url ?? event.flowId}`);
        },
      },
    };
  },
};
