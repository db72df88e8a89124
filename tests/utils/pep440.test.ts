import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  compareVersions,
  filterVersions,
  isPrerelease,
  isValidVersion,
  matchesSpecifier,
  sameVersion,
  specifiesPrerelease
} from '../../src/utils/pep440.js';

describe('isValidVersion', () => {
  it('accepts PEP 440 versions only', () => {
    assert.equal(isValidVersion('1!2.3.4rc5.post6.dev7+ubuntu.1'), true);
    assert.equal(isValidVersion('1.0'), true);
    assert.equal(isValidVersion('bogus'), false);
    assert.equal(isValidVersion(''), false);
  });
});

describe('isPrerelease', () => {
  it('flags pre and dev releases', () => {
    assert.equal(isPrerelease('1.0b1'), true);
    assert.equal(isPrerelease('1.0.dev3'), true);
    assert.equal(isPrerelease('1.0.post1'), false);
    assert.equal(isPrerelease('1.0'), false);
    assert.equal(isPrerelease('bogus'), false);
  });
});

describe('compareVersions', () => {
  it('orders releases the PEP 440 way', () => {
    const ordered = ['1.0.dev0', '1.0a1', '1.0b2', '1.0rc1', '1.0', '1.0.post1', '1.1', '1!0.5'];
    const shuffled = ['1.1', '1.0rc1', '1!0.5', '1.0', '1.0a1', '1.0.post1', '1.0.dev0', '1.0b2'];
    assert.deepEqual([...shuffled].sort(compareVersions), ordered);
  });

  it('compares release segments numerically', () => {
    assert.ok(compareVersions('1.9', '1.10') < 0);
    assert.ok(compareVersions('2.0', '1.10') > 0);
  });
});

describe('sameVersion', () => {
  it('pads release segments with zeros', () => {
    assert.equal(sameVersion('1.0', '1.0.0'), true);
    assert.equal(sameVersion('1.0', '1.1'), false);
  });

  it('falls back to text for unparsable versions', () => {
    assert.equal(sameVersion('weird', 'weird'), true);
    assert.equal(sameVersion('weird', '1.0'), false);
  });
});

describe('matchesSpecifier', () => {
  it('handles compatible release', () => {
    assert.equal(matchesSpecifier('1.4.5', '~=', '1.4.2'), true);
    assert.equal(matchesSpecifier('1.5.0', '~=', '1.4.2'), false);
    assert.equal(matchesSpecifier('1.9', '~=', '1.4'), true);
    assert.equal(matchesSpecifier('2.0', '~=', '1.4'), false);
  });

  it('handles wildcards in equality', () => {
    assert.equal(matchesSpecifier('2.1', '==', '2.*'), true);
    assert.equal(matchesSpecifier('3.0', '==', '2.*'), false);
    assert.equal(matchesSpecifier('3.0', '!=', '2.*'), true);
    assert.equal(matchesSpecifier('1.0', '!=', '1.0'), false);
  });

  it('handles ordered comparisons', () => {
    assert.equal(matchesSpecifier('2.9', '<', '3.0'), true);
    assert.equal(matchesSpecifier('3.1', '>', '3.0'), true);
    assert.equal(matchesSpecifier('3.0', '<=', '3.0'), true);
    assert.equal(matchesSpecifier('3.0', '>=', '3.0.1'), false);
  });

  it('lets pre-releases through so the caller can decide', () => {
    assert.equal(matchesSpecifier('2.0b1', '>=', '1.0'), true);
  });
});

describe('specifiesPrerelease', () => {
  it('looks at the clause versions', () => {
    assert.equal(specifiesPrerelease([['>=', '2.0b1']]), true);
    assert.equal(specifiesPrerelease([['>=', '1.0'], ['<', '2.0']]), false);
    assert.equal(specifiesPrerelease([['!=', '2.0b1']]), false);
    assert.equal(specifiesPrerelease([]), false);
  });
});

describe('filterVersions', () => {
  it('returns matching versions in ascending order', () => {
    assert.deepEqual(
      filterVersions(['1.5', 'bogus', '2.0', '1.0', '2.0b1'], [['>=', '1.0'], ['<', '2.0']]),
      ['1.0', '1.5']
    );
    assert.deepEqual(filterVersions(['1.10', '1.9', '1.2'], []), ['1.2', '1.9', '1.10']);
  });

  it('includes pre-releases only when asked for or when nothing else matches', () => {
    assert.deepEqual(filterVersions(['1.0', '2.0b1'], []), ['1.0']);
    assert.deepEqual(filterVersions(['1.0', '2.0b1'], [['>=', '2.0b1']]), ['2.0b1']);
    assert.deepEqual(filterVersions(['2.0rc1', '2.0b1'], [['>=', '1.0']]), ['2.0b1', '2.0rc1']);
  });
});
