import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { ConfigurationError } from '../../src/utils/errors';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.siteBaseUrl).toBe('https://www.anytimemailbox.com');
    expect(config.smartyApiUrl).toBe('https://us-street.api.smarty.com/street-address');
    expect(config.outputDir).toBe('Public');
    expect(config.credentialsFile).toBe('smarty_api_key.txt');
    expect(config.retry).toEqual({ attempts: 3, delayMs: 1000 });
    expect(config.listerMaxPages).toBe(200);
    expect(config.stateConcurrency).toBe(1);
  });

  it('coerces numeric values and trims the trailing slash of the site URL', () => {
    const config = loadConfig({
      SITE_BASE_URL: 'https://mailbox.test/',
      RETRY_ATTEMPTS: '5',
      RETRY_DELAY_MS: '250',
      REQUEST_DELAY_MS: '0',
    });
    expect(config.siteBaseUrl).toBe('https://mailbox.test');
    expect(config.retry).toEqual({ attempts: 5, delayMs: 250 });
    expect(config.requestDelayMs).toBe(0);
  });

  it('rejects out-of-range values with the offending key', () => {
    expect(() => loadConfig({ RETRY_ATTEMPTS: '0' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ RETRY_ATTEMPTS: '0' })).toThrow(/RETRY_ATTEMPTS/);
    expect(() => loadConfig({ SMARTY_API_URL: 'not a url' })).toThrow(/SMARTY_API_URL/);
  });
});
