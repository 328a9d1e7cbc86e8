/**
 * Credentials Module
 *
 * Token lifecycle for authenticated publish calls.
 */

export {
  type CredentialRecord,
  type CredentialRepository,
  type CredentialState,
  type CredentialStatus,
  type CredentialManagerConfig,
  type TokenRefresher,
} from './types.js';

export {
  CredentialManager,
  DEFAULT_CREDENTIAL_CONFIG,
  evaluateRecord,
  type CredentialManagerOptions,
} from './manager.js';

export { DrizzleCredentialRepository } from './repository.js';

export { TikTokTokenClient, PUBLISH_SCOPES, type TokenClientConfig } from './tokenClient.js';
