export { OAuthConfig } from './OAuthConfig';
export type { RequestModifier } from './OAuthConfig';
export { AuthorizationCodeConnector } from './AuthorizationCodeConnector';
export type { AccessTokenOptions, RefreshTokenOptions } from './AuthorizationCodeConnector';
export { GetAccessTokenRequest } from './requests/GetAccessTokenRequest';
export { GetRefreshTokenRequest } from './requests/GetRefreshTokenRequest';
export { GetUserRequest } from './requests/GetUserRequest';
