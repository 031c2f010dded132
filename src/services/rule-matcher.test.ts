import { describe, it, expect } from 'vitest';
import { describeActions, evaluateRules, matchRule } from './rule-matcher.js';
import type { Rule } from '../models/rules.js';

const family = { id: '100', name: 'Family' };
const holidays = { id: '200', name: 'Holidays' };

function rule(condition: Rule['condition'], deleteKeywords = false, albums = [family]): Rule {
  return { condition, action: { delete: deleteKeywords, albums } };
}

describe('matchRule', () => {
  it('skips a rule when every excludesAll keyword is present', () => {
    const r = rule({ excludesAll: ['a', 'b'], includesAny: ['c'] });
    expect(matchRule(['a', 'b', 'c'], r)).toBeNull();
  });

  it('does not skip when only some excludesAll keywords are present', () => {
    const r = rule({ excludesAll: ['a', 'z'], includesAny: ['c'] });
    expect(matchRule(['a', 'b', 'c'], r)).toEqual(['c']);
  });

  it('skips a rule when any excludesAny keyword is present', () => {
    const r = rule({ excludesAny: ['x', 'b'], includesAll: ['a'] });
    expect(matchRule(['a', 'b', 'c'], r)).toBeNull();
  });

  it('matches includesAll only when all keywords are present', () => {
    expect(matchRule(['a', 'b', 'c'], rule({ includesAll: ['b', 'a'] }))).toEqual(['b', 'a']);
    expect(matchRule(['a', 'c'], rule({ includesAll: ['a', 'b'] }))).toBeNull();
  });

  it('returns the present subset for includesAny', () => {
    expect(matchRule(['a', 'b', 'c'], rule({ includesAny: ['c', 'x', 'a'] }))).toEqual(['a', 'c']);
  });

  it('prefers includesAll over includesAny', () => {
    const r = rule({ includesAll: ['z'], includesAny: ['a'] });
    expect(matchRule(['a'], r)).toBeNull();
  });

  it('treats a rule with no include conditions as inert', () => {
    expect(matchRule(['a'], rule({}))).toBeNull();
    expect(matchRule(['a'], rule({ excludesAny: ['z'] }))).toBeNull();
    expect(matchRule(['a'], rule({ includesAll: [], includesAny: [] }))).toBeNull();
  });
});

describe('evaluateRules', () => {
  it('removes includesAll keywords and adds the album', () => {
    const actions = evaluateRules(['a', 'b', 'c'], [rule({ includesAll: ['a', 'b'] }, true, [family])]);

    expect(actions.keywordsToRemove).toEqual(['a', 'b']);
    expect(actions.keywordsToAdd).toEqual(['c']);
    expect(actions.albumsToAddTo).toEqual([family]);
  });

  it('leaves everything unchanged when includesAny does not match', () => {
    const actions = evaluateRules(['a', 'b', 'c'], [rule({ includesAny: ['x', 'y'] }, true)]);

    expect(actions).toEqual({ keywordsToRemove: [], keywordsToAdd: ['a', 'b', 'c'], albumsToAddTo: [] });
  });

  it('never lets an excluded rule contribute', () => {
    const rules = [
      rule({ excludesAll: ['a', 'b'], includesAny: ['a'] }, true, [holidays]),
      rule({ excludesAny: ['c'], includesAll: ['b'] }, true, [holidays]),
    ];
    const actions = evaluateRules(['a', 'b', 'c'], rules);

    expect(actions.keywordsToRemove).toEqual([]);
    expect(actions.albumsToAddTo).toEqual([]);
  });

  it('accumulates across all matching rules without short-circuiting', () => {
    const rules = [
      rule({ includesAny: ['private'] }, true, []),
      rule({ includesAll: ['family'] }, false, [family]),
      rule({ includesAny: ['private', 'family'] }, true, [holidays, family]),
    ];
    const actions = evaluateRules(['private', 'family', 'beach'], rules);

    expect(actions.keywordsToRemove).toEqual(['private', 'family']);
    expect(actions.keywordsToAdd).toEqual(['beach']);
    expect(actions.albumsToAddTo).toEqual([family, holidays, family]);
  });

  it('keeps albums without deleting keywords when delete is off', () => {
    const actions = evaluateRules(['a', 'b'], [rule({ includesAny: ['a'] }, false, [family])]);

    expect(actions.keywordsToRemove).toEqual([]);
    expect(actions.keywordsToAdd).toEqual(['a', 'b']);
    expect(actions.albumsToAddTo).toEqual([family]);
  });

  it('does not modify the input keywords', () => {
    const keywords = ['private', 'family'];
    evaluateRules(keywords, [rule({ includesAny: ['private'] }, true, [])]);
    expect(keywords).toEqual(['private', 'family']);
  });

  it('returns no actions when there are no rules', () => {
    expect(evaluateRules(['a'], [])).toEqual({ keywordsToRemove: [], keywordsToAdd: ['a'], albumsToAddTo: [] });
  });
});

describe('describeActions', () => {
  it('lists removals and albums', () => {
    const lines = describeActions({
      keywordsToRemove: ['private', 'draft'],
      keywordsToAdd: ['family'],
      albumsToAddTo: [family, holidays],
    });

    expect(lines).toEqual([
      'Actions:',
      '  - keywords to remove: private, draft',
      '  - albums to add to: Family (100), Holidays (200)',
    ]);
  });

  it('is empty when there is nothing to do', () => {
    expect(describeActions({ keywordsToRemove: [], keywordsToAdd: ['a'], albumsToAddTo: [] })).toEqual([]);
  });
});
