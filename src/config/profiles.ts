// src/config/profiles.ts

import type { RequestParams } from '../core/transport/types';

/**
 * Everything that differs between deployments of the same data API:
 * where it lives, how its credential is found and which defaults apply.
 */
export interface ClientProfile {
  name: string;
  baseUrl: string;
  credentialEnvVar: string;
  enableRateLimit: boolean;
  limitsNamespace: string;
  requiredParams: Record<string, RequestParams>;
  rateLimitMarkers: string[];
}

// Message the server sends when a per-minute quota is hit ("at most N calls per minute")
export const RATE_LIMIT_MARKER = '每分钟最多访问';

export const PROFILES = {
  tushare: {
    name: 'tushare',
    baseUrl: 'http://api.tushare.pro',
    credentialEnvVar: 'TUSHARE_TOKEN',
    enableRateLimit: true,
    limitsNamespace: 'tushare-api-limits',
    requiredParams: {
      index_weight: { index_code: '000906.SH' },
    },
    rateLimitMarkers: [RATE_LIMIT_MARKER],
  },
  datacube: {
    name: 'datacube',
    baseUrl: 'http://datacubeapi.foundersc.com',
    credentialEnvVar: 'DATACUBE_TOKEN',
    enableRateLimit: false,
    limitsNamespace: 'datacube-api-limits',
    requiredParams: {
      fund_nav: { end_date: '20250506' },
    },
    rateLimitMarkers: [RATE_LIMIT_MARKER],
  },
} satisfies Record<string, ClientProfile>;

export type ProfileName = keyof typeof PROFILES;

export function resolveProfile(profile: ProfileName | ClientProfile): ClientProfile {
  return typeof profile === 'string' ? PROFILES[profile] : profile;
}
