import { describe, expect, it } from 'vitest';
import { extractSuite, extractUnitToken, isRedirectedAway, resolveDetailUrl } from '../../src/modules/detail/suite_extractor';
import { detailHtml } from '../helpers';

describe('extractUnitToken', () => {
  it('picks the unit designator off an address line', () => {
    expect(extractUnitToken('100 Main St Ste 210 #MAILBOX')).toBe('Ste 210');
    expect(extractUnitToken('77 Water St Suite 5B')).toBe('Suite 5B');
    expect(extractUnitToken('9 Elm Ave Apt. 4B')).toBe('Apt. 4B');
    expect(extractUnitToken('1000 N Green Valley Pkwy #440 #MAILBOX')).toBe('#440');
  });

  it('ignores the mailbox placeholder on its own', () => {
    expect(extractUnitToken('123 Main St #MAILBOX')).toBeUndefined();
    expect(extractUnitToken('123 Main St')).toBeUndefined();
  });
});

describe('extractSuite', () => {
  it('reads the first address card and skips noise lines', () => {
    const html = detailHtml(['Your Name', '1000 N Green Valley Pkwy #440 #MAILBOX', 'Henderson, NV 89074', 'United States']);
    expect(extractSuite(html)).toBe('#440');
  });

  it('does not pick up the suite from the page footer', () => {
    expect(extractSuite(detailHtml(['1 Main St', 'Akron, OH 44308']))).toBeUndefined();
  });

  it('returns undefined without an address card', () => {
    expect(extractSuite('<html><body><p>Suite 9</p></body></html>')).toBeUndefined();
  });
});

describe('isRedirectedAway', () => {
  it('flags the locations list and the home page', () => {
    expect(isRedirectedAway('https://mailbox.test/locations', 'https://mailbox.test')).toBe(true);
    expect(isRedirectedAway('https://mailbox.test/', 'https://mailbox.test')).toBe(true);
    expect(isRedirectedAway('https://mailbox.test/s/akron-100-main-st', 'https://mailbox.test')).toBe(false);
  });
});

describe('resolveDetailUrl', () => {
  it('keeps absolute URLs and resolves root-relative paths against the site', () => {
    expect(resolveDetailUrl('https://mailbox.test/s/a', 'https://mailbox.test')).toBe('https://mailbox.test/s/a');
    expect(resolveDetailUrl('/s/a', 'https://mailbox.test')).toBe('https://mailbox.test/s/a');
    expect(resolveDetailUrl('/s/a', 'https://mailbox.test/')).toBe('https://mailbox.test/s/a');
  });

  it('rejects values that are not a page on the site', () => {
    expect(resolveDetailUrl(undefined, 'https://mailbox.test')).toBeUndefined();
    expect(resolveDetailUrl('see notes', 'https://mailbox.test')).toBeUndefined();
    expect(resolveDetailUrl('ftp://mailbox.test/s/a', 'https://mailbox.test')).toBeUndefined();
  });
});
