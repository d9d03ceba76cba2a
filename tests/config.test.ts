import { describe, it, expect } from 'vitest';
import { JobClient } from '../src/client';
import { DEFAULTS, configFromEnv, mergeConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';
import type { JobClientOptions } from '../src/types';
import { BASE_URL } from './helpers/fakeScheduler';

const creds = { httpUser: 'foo', httpPassword: 'test-secret' };

describe('JobClient configuration', () => {
  it('applies defaults', () => {
    const client = new JobClient({ url: BASE_URL, ...creds });

    expect(client.getUrl()).toBe(BASE_URL);
    expect(client.getAuth()).toBe('http_basic');
    expect(client.getDefaultJobSettings()).toEqual({ max_retries: 1 });
    expect(client.config.batchRequestSize).toBe(32);
    expect(client.config.statusUpdateIntervalMs).toBe(10_000);
    expect(client.config.requestTimeoutMs).toBe(60_000);
  });

  it('returns a copy of the default job settings', () => {
    const client = new JobClient({ url: BASE_URL, ...creds, defaultJobSettings: { max_retries: 10 } });
    const settings = client.getDefaultJobSettings();
    settings.max_retries = 99;

    expect(client.getDefaultJobSettings()).toEqual({ max_retries: 10 });
  });

  it('requires HTTP basic credentials', () => {
    expect(() => new JobClient({ url: BASE_URL })).toThrow('HTTP user is required when authentication is HTTP basic');
    expect(() => new JobClient({ url: BASE_URL, httpUser: 'foo' })).toThrow(
      'HTTP password is required when authentication is HTTP basic'
    );
  });

  it('requires a token provider for kerberos', () => {
    expect(() => new JobClient({ url: BASE_URL, auth: 'kerberos' })).toThrow(ConfigurationError);

    const client = new JobClient({ url: BASE_URL, auth: 'kerberos', kerberosTokenProvider: async () => 'dG9rZW4=' });
    expect(client.getAuth()).toBe('kerberos');
  });

  it('rejects unsupported authentication types', () => {
    // configuration coming from untyped callers
    const opts: JobClientOptions = JSON.parse(`{"url":"${BASE_URL}","auth":"ntlm"}`);

    expect(() => new JobClient(opts)).toThrow(ConfigurationError);
    expect(() => new JobClient(opts)).toThrow('authentication type ntlm not supported');
  });

  it('rejects invalid URLs and sizes', () => {
    expect(() => new JobClient({ url: 'not a url', ...creds })).toThrow(/absolute URL/);
    expect(() => new JobClient({ url: 'ftp://scheduler.test', ...creds })).toThrow('url: url must use http or https');
    expect(() => new JobClient({ url: BASE_URL, ...creds, batchRequestSize: 0 })).toThrow(/^batchRequestSize: /);
    expect(() => new JobClient({ url: BASE_URL, ...creds, requestTimeoutMs: 1.5 })).toThrow(/^requestTimeoutMs: /);
  });

  it('validates the default job settings', () => {
    expect(() => new JobClient({ url: BASE_URL, ...creds, defaultJobSettings: { max_retries: 0 } })).toThrow(
      'defaultJobSettings.max_retries: Number must be greater than 0'
    );
    expect(() => new JobClient({ url: BASE_URL, ...creds, defaultJobSettings: { mem: -1 } })).toThrow(ConfigurationError);
    expect(() =>
      new JobClient({ url: BASE_URL, ...creds, defaultJobSettings: { uuid: '6e4f2a10-b3c1-11ee-9c2d-0242ac120002' } })
    ).toThrow("defaultJobSettings: Unrecognized key(s) in object: 'uuid'");

    const client = new JobClient({ url: BASE_URL, ...creds, defaultJobSettings: { max_retries: 3, cpus: 0.5, labels: { team: 'ops' } } });
    expect(client.getDefaultJobSettings()).toEqual({ max_retries: 3, cpus: 0.5, labels: { team: 'ops' } });
  });

  it('does not let undefined options override defaults', () => {
    const cfg = mergeConfig({ url: BASE_URL, batchRequestSize: undefined, auth: undefined });

    expect(cfg.batchRequestSize).toBe(DEFAULTS.batchRequestSize);
    expect(cfg.auth).toBe('http_basic');
  });
});

describe('configFromEnv', () => {
  it('reads SCHEDULER_* variables', () => {
    const opts = configFromEnv({
      SCHEDULER_URL: BASE_URL,
      SCHEDULER_AUTH: 'http_basic',
      SCHEDULER_HTTP_USER: 'foo',
      SCHEDULER_HTTP_PASSWORD: 'test-secret',
      SCHEDULER_BATCH_REQUEST_SIZE: '8',
      SCHEDULER_STATUS_UPDATE_INTERVAL_MS: '500'
    });

    expect(opts).toEqual({
      url: BASE_URL,
      auth: 'http_basic',
      httpUser: 'foo',
      httpPassword: 'test-secret',
      batchRequestSize: 8,
      statusUpdateIntervalMs: 500,
      requestTimeoutMs: undefined
    });

    const client = new JobClient(opts);
    expect(client.config.batchRequestSize).toBe(8);
    expect(client.config.requestTimeoutMs).toBe(60_000);
  });

  it('fails on missing URL, unknown auth and non-numeric sizes', () => {
    expect(() => configFromEnv({})).toThrow('SCHEDULER_URL is required');
    expect(() => configFromEnv({ SCHEDULER_URL: BASE_URL, SCHEDULER_AUTH: 'ntlm' })).toThrow(
      'authentication type ntlm not supported'
    );
    expect(() => configFromEnv({ SCHEDULER_URL: BASE_URL, SCHEDULER_BATCH_REQUEST_SIZE: 'abc' })).toThrow(
      'SCHEDULER_BATCH_REQUEST_SIZE must be a positive integer, got "abc"'
    );
  });
});
