export const CREDENTIALS_ENV = 'GOOGLE_APPLICATION_CREDENTIALS';
export const PROJECT_ENV = 'GCLOUD_PROJECT';

export const SDK_CONFIG_DIRECTORY = 'gcloud';
export const SDK_CREDENTIALS_FILENAME = 'application_default_credentials.json';
export const SDK_ACTIVE_CONFIG_PATH = ['configurations', 'config_default'] as const;

export const HELP_MESSAGE =
  `Could not automatically determine credentials. Please set ${CREDENTIALS_ENV} or ` +
  'explicitly create credentials and re-run the application. For more information, please see ' +
  'https://developers.google.com/accounts/docs/application-default-credentials.';
