export const USER_LOOKUP = Symbol('USER_LOOKUP');
export const AUTH_SETTINGS = Symbol('AUTH_SETTINGS');
export const AUTH_CLOCK = Symbol('AUTH_CLOCK');

export const CREDENTIALS_MESSAGE = 'Could not validate credentials';
export const INVALID_LOGIN_MESSAGE = 'Invalid email or password';
