export interface ConfigGoogleDriveInterface {
  /** Path of the OAuth client credential file downloaded from the Google console */
  clientSecretPath: string;
  /** Path where the authorised user token is stored */
  tokenPath: string;
  /** Name of the Drive folder that holds one sub-folder per cat */
  rootFolderName: string;
  /** Overrides the first redirect URI of the client credential when set */
  redirectUri: string;
}
