export {
  AuthFailure,
  AuthResult,
  DIGEST_REQUIRED_FIELDS,
  type AuthRequest,
  type AuthScheme,
  type DigestCredentialFields,
  type DigestField,
  type HttpAuthScheme,
  type User,
} from './types.js';
export { CredentialStore, encodeBasicCredential } from './CredentialStore.js';
export { BasicAuthenticator } from './BasicAuthenticator.js';
export {
  DigestAuthenticator,
  buildAuthorizationString,
  md5Digest,
  parseAuthorizationFields,
  pickDigestFields,
  type HashPair,
} from './DigestAuthenticator.js';
export { Authenticator, MESSAGE_401_TEMPLATE, type AuthenticatorOptions } from './Authenticator.js';
