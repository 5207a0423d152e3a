export type { Authenticator, OAuthAuthenticator } from './Authenticator';
export { TokenAuthenticator } from './TokenAuthenticator';
export { BasicAuthenticator } from './BasicAuthenticator';
export { QueryAuthenticator } from './QueryAuthenticator';
export { HeaderAuthenticator } from './HeaderAuthenticator';
export { AccessTokenAuthenticator } from './AccessTokenAuthenticator';
