/**
 * ScopeSet Benchmarks
 *
 * Scope lists are decoded and intersected for every inbound discovery
 * message, so both paths are measured at realistic and at large sizes.
 */

import { describe, bench } from 'vitest';
import { ScopeSet } from '../src/scope/scope-set.js';
import { ScopeMatcher } from '../src/scope/scope-matcher.js';
import { Logger } from '../src/utils/logger.js';

// =============================================================================
// Test Data Setup
// =============================================================================

const scopeNames = (prefix: string, count: number): string[] =>
  Array.from({ length: count }, (_, i) => `${prefix}-${i}`);

const smallLocal = new ScopeSet(['default', 'east-wing', 'stage']);
const smallRemote = new ScopeSet(['west-wing', 'stage']);

const largeLocal = new ScopeSet(scopeNames('zone', 500));
const largeDisjoint = new ScopeSet(scopeNames('area', 500));
const largeOverlap = new ScopeSet([...scopeNames('zone', 250), ...scopeNames('area', 250)]);

const largeList = largeOverlap.toEscapedString();

const matcher = new ScopeMatcher(smallLocal, { logger: new Logger({ level: 'silent' }) });

// =============================================================================
// Benchmarks
// =============================================================================

describe('ScopeSet algebra', () => {
  bench('intersects (3 x 2 scopes)', () => {
    smallLocal.intersects(smallRemote);
  });

  bench('intersects (500 x 500 disjoint)', () => {
    largeLocal.intersects(largeDisjoint);
  });

  bench('intersection (500 x 500, 250 shared)', () => {
    largeLocal.intersection(largeOverlap);
  });

  bench('differenceUpdate (500 - 500, 250 shared)', () => {
    largeLocal.clone().differenceUpdate(largeOverlap);
  });
});

describe('Scope list decoding', () => {
  bench('decode 2 scopes', () => {
    ScopeSet.fromString('west-wing,stage');
  });

  bench('decode 500 scopes', () => {
    ScopeSet.fromString(largeList);
  });

  bench('matcher (cached list)', () => {
    matcher.match('west-wing,stage');
  });
});
