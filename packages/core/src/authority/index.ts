export {
  LocalTokenAuthority,
  RemoteTokenAuthority,
  createTokenAuthority,
} from './token-authority.js';
export type {
  TokenAuthority,
  TokenAuthorityDependencies,
  AuthorityHealth,
  RemoteHealthStatus,
} from './token-authority.js';
export { RemoteAuthorityClient, RemoteAuthorityError } from './remote-authority-client.js';
export type { FetchFn, RemoteAuthorityClientOptions } from './remote-authority-client.js';
