/** Token endpoint used for stored end-user credentials */
export const GOOGLE_OAUTH2_TOKEN_ENDPOINT = 'https://accounts.google.com/o/oauth2/token';

export const JWT_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
export const REFRESH_GRANT_TYPE = 'refresh_token';
