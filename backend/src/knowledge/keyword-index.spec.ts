import { describe, expect, it } from '@jest/globals';

import {
  buildTermProfile,
  queryTerms,
  scoreKeywordOverlap,
  stem,
  tokenize,
} from './keyword-index.js';

describe('keyword index', () => {
  it('lowercases, drops stopwords and stems', () => {
    expect(tokenize('The Refund policies are being processed!')).toEqual([
      'refund',
      'policy',
      'being',
      'process',
    ]);
  });

  it('leaves short words and -ss endings alone', () => {
    expect(stem('bus')).toBe('bus');
    expect(stem('access')).toBe('access');
    expect(stem('classes')).toBe('class');
  });

  it('splits on any non letter or digit', () => {
    expect(tokenize('v2-api/config_file')).toEqual([
      'v2',
      'api',
      'config',
      'file',
    ]);
  });

  it('deduplicates and sorts query terms', () => {
    expect(queryTerms('refund refunds policy')).toEqual(['policy', 'refund']);
  });

  it('counts term frequencies', () => {
    expect(buildTermProfile('Refund policy: refunds take five days')).toEqual({
      termFrequencies: { refund: 2, policy: 1, take: 1, five: 1, day: 1 },
      tokenCount: 6,
    });
  });

  it('scores overlap as matched frequency over token count', () => {
    const profile = buildTermProfile('Refund policy: refunds take five days');

    expect(scoreKeywordOverlap(['policy', 'refund'], profile)).toBe(0.5);
    expect(scoreKeywordOverlap(['warranty'], profile)).toBe(0);
  });

  it('scores an empty profile as zero', () => {
    expect(scoreKeywordOverlap(['refund'], buildTermProfile('the a of'))).toBe(0);
  });
});
