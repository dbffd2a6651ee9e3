export * from './youtube.js';
export * from './auth.js';
export * from './audit.js';
export * from './removal.js';

export interface AppConfig {
  clientId: string;
  clientSecret?: string;
  redirectUri: string;
  scopes: string[];
  credentialsFile: string;
  sessionOnly: boolean;
  auditDb: string;
  resetOnError: boolean;
}
