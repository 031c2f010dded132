import { formatAlbum, type Album, type Rule } from '../models/rules.js';
import { containsAll, containsAny, difference, intersection, unique } from '../utils/keywords.js';

export interface RuleActions {
  /** Keywords stripped from the file and left out of the uploaded tags */
  keywordsToRemove: string[];
  /** Keywords sent to Flickr as tags */
  keywordsToAdd: string[];
  /** Albums to add the photo to, in rule order. May repeat an album. */
  albumsToAddTo: Album[];
}

function hasItems(list: string[] | undefined): list is string[] {
  return list !== undefined && list.length > 0;
}

/**
 * Keywords a rule matched, or null when the rule does not apply to the image.
 *
 * A rule with neither includesAll nor includesAny never applies, even when it
 * has no exclusions either.
 */
export function matchRule(keywords: readonly string[], rule: Rule): string[] | null {
  const { excludesAll, excludesAny, includesAll, includesAny } = rule.condition;

  if (hasItems(excludesAll) && containsAll(keywords, excludesAll)) {
    return null;
  }
  if (hasItems(excludesAny) && containsAny(keywords, excludesAny)) {
    return null;
  }

  if (hasItems(includesAll)) {
    return containsAll(keywords, includesAll) ? [...includesAll] : null;
  }
  if (hasItems(includesAny)) {
    const matched = intersection(keywords, includesAny);
    return matched.length > 0 ? matched : null;
  }
  return null;
}

/**
 * Run every rule against an image's keywords and accumulate the results.
 * All rules are evaluated; a match does not stop the ones after it.
 */
export function evaluateRules(keywords: readonly string[], rules: readonly Rule[]): RuleActions {
  let keywordsToRemove: string[] = [];
  const albumsToAddTo: Album[] = [];

  for (const rule of rules) {
    const matched = matchRule(keywords, rule);
    if (matched === null) continue;

    if (rule.action.delete) {
      keywordsToRemove = unique([...keywordsToRemove, ...matched]);
    }
    albumsToAddTo.push(...rule.action.albums);
  }

  return {
    keywordsToRemove,
    keywordsToAdd: keywordsToRemove.length > 0 ? difference(keywords, keywordsToRemove) : [...keywords],
    albumsToAddTo,
  };
}

export function hasActions(actions: RuleActions): boolean {
  return actions.keywordsToRemove.length > 0 || actions.albumsToAddTo.length > 0;
}

/**
 * Lines describing what the rules will do, empty when they do nothing
 */
export function describeActions(actions: RuleActions): string[] {
  if (!hasActions(actions)) return [];

  const lines = ['Actions:'];
  if (actions.keywordsToRemove.length > 0) {
    lines.push(`  - keywords to remove: ${actions.keywordsToRemove.join(', ')}`);
  }
  if (actions.albumsToAddTo.length > 0) {
    lines.push(`  - albums to add to: ${actions.albumsToAddTo.map(formatAlbum).join(', ')}`);
  }
  return lines;
}
