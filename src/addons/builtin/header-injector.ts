import { z } from 'zod';
import type { AddonModule } from '../types.js';

const HeaderSetSchema = z.record(z.string().min(1), z.string());

const HeaderInjectorConfigSchema = z.object({
  request: HeaderSetSchema.default({}),
  response: HeaderSetSchema.default({}),
  /** Removed from both directions */
  remove: z.array(z.string().min(1)).default([]),
});

export const headerInjector: AddonModule = {
  manifest: {
    name: 'header-injector',
    displayName: 'Header Injector',
    version: '1.0.0',
    description: 'Sets and strips headers on requests and responses',
    hooks: {
      onRequest: { event: 'request-received', match: [] },
      onResponse: { event: 'response-received', match: [] },
    },
  },
  configSchema: HeaderInjectorConfigSchema,
  setup({ config }) {
    const { request, response, remove } = HeaderInjectorConfigSchema.parse(config);
    const edit = (headers: Record<string, string>) => {
      if (Object.keys(headers).length === 0 && remove.length === 0) return;
      return { setHeaders: headers, removeHeaders: remove };
    };

    return {
      handlers: {
        onRequest: () => edit(request),
        onResponse: () => edit(response),
      },
    };
  },
};
