import type { AuthMode, JobClientConfig } from '../types';
import { ConfigurationError } from '../errors';
import { BasicAuth } from './basic';
import { KerberosAuth } from './kerberos';

export interface AuthProvider {
  readonly mode: AuthMode;
  /** Value of the `Authorization` header for a request to `url`. */
  authorize(url: URL): Promise<string>;
}

export function createAuthProvider(cfg: Pick<JobClientConfig, 'auth' | 'httpUser' | 'httpPassword' | 'kerberosTokenProvider'>): AuthProvider {
  switch (cfg.auth) {
    case 'http_basic':
      if (cfg.httpUser === undefined || cfg.httpPassword === undefined) {
        throw new ConfigurationError('HTTP user and password are required when authentication is HTTP basic');
      }
      return new BasicAuth(cfg.httpUser, cfg.httpPassword);
    case 'kerberos':
      if (!cfg.kerberosTokenProvider) throw new ConfigurationError('kerberosTokenProvider is required when authentication is kerberos');
      return new KerberosAuth(cfg.kerberosTokenProvider);
    default:
      throw new ConfigurationError(`authentication type ${String(cfg.auth)} not supported`);
  }
}

export { BasicAuth, KerberosAuth };
