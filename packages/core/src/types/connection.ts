/**
 * Credentials for the secondary FileMaker backend, carried alongside the MySQL ones.
 */
export interface FilemakerCredentials {
  username: string;
  password: string;
}

/**
 * Connection data served by the remote configuration endpoint.
 */
export interface DatabaseConnectionData {
  /** MySQL host, optionally with ":port" */
  host: string;
  /** MySQL user */
  user: string;
  /** MySQL password */
  password: string;
  /** FileMaker credentials */
  filemaker: FilemakerCredentials;
  /** Authentication hash */
  hash: string;
}
