// src/core/limits/types.ts

export interface EndpointLimits {
  endpointName: string;
  perRequestCap: number; // 0 = no known cap, fetch in one call
  ratePerMinute: number; // 0 = unrestricted
  lastUpdated: Date;
}

export interface LimitStore {
  get(endpointName: string): Promise<EndpointLimits | null>;
  put(limits: EndpointLimits): Promise<void>;
  delete(endpointName: string): Promise<void>;
  disconnect?(): Promise<void>;
}

export interface LimitStoreConfig {
  backend: 'memory' | 'redis' | 'postgres';
  url?: string;
  namespace?: string;
}

export interface ProbeConfig {
  defaultPerRequestCap: number;
  sampleLimit: number;
  windowMs: number;
  rateLimitMarkers: string[];
}
