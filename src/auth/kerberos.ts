import type { AuthProvider } from './index';
import type { KerberosTokenProvider } from '../types';

/**
 * SPNEGO (`Negotiate`) authentication. Token generation is delegated to the supplied provider,
 * which is asked for a fresh token for `HTTP@<host>` on every request.
 */
export class KerberosAuth implements AuthProvider {
  readonly mode = 'kerberos' as const;

  constructor(private readonly tokenProvider: KerberosTokenProvider) {}

  async authorize(url: URL): Promise<string> {
    const token = await this.tokenProvider(`HTTP@${url.hostname}`);
    if (!token) throw new Error(`kerberos token provider returned no token for ${url.hostname}`);
    return `Negotiate ${token}`;
  }
}
