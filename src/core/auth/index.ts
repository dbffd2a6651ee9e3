export { AuthorizationFlow, createStateToken, type AuthorizationRequest } from './flow.js';
export { AuthSession } from './session.js';
export { FileCredentialStore, MemoryCredentialStore, type CredentialStore } from './store.js';
export { GoogleTokenEndpoint, GOOGLE_TOKEN_URI, type TokenEndpoint } from './google.js';
export { startCallbackServer, parseCallbackUrl, type CallbackServer } from './callback-server.js';
