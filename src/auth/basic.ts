import type { AuthProvider } from './index';

/**
 * HTTP Basic credentials, sent with every request.
 */
export class BasicAuth implements AuthProvider {
  readonly mode = 'http_basic' as const;
  private readonly header: string;

  constructor(readonly user: string, password: string) {
    this.header = `Basic ${Buffer.from(`${user}:${password}`, 'utf8').toString('base64')}`;
  }

  async authorize(): Promise<string> {
    return this.header;
  }
}
