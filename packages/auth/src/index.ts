export * from './csrf';
export * from './errors';
export * from './exchangeStore';
export * from './oidc';
export * from './pkce';
export * from './psk';
export * from './relyingParty';
export * from './session';
export * from './tokens';
export * from './types';
