export interface EnvBundleProfile {
  kind: 'env-bundle';
  identity: string;
  defaultServiceSerial: string;
  certB64: string;
  keyB64: string;
  caB64: string;
  keyPasswordB64: string;
}

export interface LocalDirectoryProfile {
  kind: 'local-directory';
  identity: string;
  /** Directory holding the onboarded certificate material */
  searchPath: string;
  /** Recognized credential files found in `searchPath` */
  credentialFiles: string[];
  defaultServiceSerial?: string;
  keyPasswordB64?: string;
}

export interface InteractiveLoginProfile {
  kind: 'interactive-login';
  identity: string;
  defaultServiceSerial?: string;
}

export type CredentialProfile = EnvBundleProfile | LocalDirectoryProfile | InteractiveLoginProfile;

export type CredentialProfileKind = CredentialProfile['kind'];

/**
 * Certificate material written to disk for the device client. The key
 * password is never written out.
 */
export interface MaterializedCredential {
  directory: string;
  certPath: string;
  keyPath: string;
  caPath: string;
  keyPassword: string;
  files: string[];
}

export interface CleanupFailure {
  path: string;
  message: string;
}

export interface CleanupReport {
  removed: string[];
  failures: CleanupFailure[];
}
