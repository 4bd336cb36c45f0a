export * from './customer.js';
export * from './import.js';
export * from './storage.js';

// API response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  version: string;
  services: {
    database: 'up' | 'down';
    storage: 'up' | 'down';
  };
}
