import { z } from 'zod';
import { matchDomainWildcard } from '../../core/rules/matcher.js';
import type { AddonModule } from '../types.js';

const HostBlockerConfigSchema = z.object({
  /** Exact hosts or domain wildcards (`*.ads.example`, `+.tracker.example`) */
  hosts: z.array(z.string().min(1)).default([]),
  statusCode: z.number().int().min(400).max(599).default(403),
});

/**
 * Refuses requests to configured hosts before anything else sees them
 */
export const hostBlocker: AddonModule = {
  manifest: {
    name: 'host-blocker',
    displayName: 'Host Blocker',
    version: '1.0.0',
    description: 'Blocks requests to configured hosts',
    hooks: {
      block: {
        event: 'request-received',
        match: [{ field: 'host', op: 'exists' }],
        priority: 10,
        shortCircuit: true,
      },
    },
  },
  configSchema: HostBlockerConfigSchema,
  setup({ config }) {
    const { hosts, statusCode } = HostBlockerConfigSchema.parse(config);
    const patterns = hosts.map((host) => host.toLowerCase());

    return {
      handlers: {
        block: (event) => {
          const host = event.attributes.host;
          if (!host || !patterns.some((pattern) => pattern === host || matchDomainWildcard(pattern, host))) {
            return;
          }
          return { block: { statusCode, reason: `Host ${host} is blocked` } };
        },
      },
    };
  },
};
