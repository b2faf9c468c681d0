import { describe, it, expect } from '@jest/globals';

import { directory, presetNames, resolveEndpoint } from '../../src/directory.js';

describe('resolveEndpoint', () => {
  it('resolves presets case-insensitively', () => {
    expect(resolveEndpoint('letsencrypt')).toBe(directory.letsencrypt.production.directoryUrl);
    expect(resolveEndpoint(' LetsEncrypt-Staging ')).toBe('https://acme-staging-v02.api.letsencrypt.org/directory');
    expect(resolveEndpoint('buypass')).toBe('https://api.buypass.com/acme/directory');
  });

  it('passes https URLs through', () => {
    expect(resolveEndpoint('https://acme.test/directory')).toBe('https://acme.test/directory');
  });

  it('rejects anything else', () => {
    expect(resolveEndpoint('http://acme.test/directory')).toBeUndefined();
    expect(resolveEndpoint('zerossl')).toBeUndefined();
  });
});

describe('presetNames', () => {
  it('lists staging and production presets', () => {
    expect(presetNames()).toEqual(['letsencrypt', 'letsencrypt-staging', 'buypass', 'buypass-staging']);
  });
});
