export { loadConfig, parseScopes, DEFAULT_SCOPES, DEFAULT_REDIRECT_URI } from './loader.js';
