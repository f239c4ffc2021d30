/**
 * Ranker Module
 *
 * Match tiers: exact > prefix > contains (never cross tiers).
 * Within a tier, candidates sort by case-insensitive codepoint order of their text;
 * ties keep the order matchers produced them in.
 */

import type { Candidate, MatchType, RankedCandidate } from './types'

const MATCH_TIER: Record<MatchType, number> = {
  exact: 3,
  prefix: 2,
  contains: 1,
  none: 0, // No prefix typed
}

export const DEFAULT_MAX_CANDIDATES = 50

/**
 * Compute how a candidate's text matches the typed prefix.
 * A leading `$` or `\` on the candidate is ignored unless the prefix has one too.
 */
export function computeMatchType(value: string, partial: string | null): MatchType {
  if (!partial) return 'none'

  const valueLower = stripSigil(value, partial).toLowerCase()
  const partialLower = partial.toLowerCase()

  if (valueLower === partialLower) {
    return 'exact'
  }
  if (valueLower.startsWith(partialLower)) {
    return 'prefix'
  }
  if (valueLower.includes(partialLower)) {
    return 'contains'
  }
  return 'none'
}

function stripSigil(value: string, partial: string): string {
  const first = value[0]
  if ((first === '$' || first === '\\' || first === "'") && partial[0] !== first) {
    return value.slice(1)
  }
  return value
}

/**
 * Check whether a value matches the typed prefix. Everything matches an empty prefix.
 */
export function isMatch(value: string, partial: string | null): boolean {
  if (!partial) return true
  return computeMatchType(value, partial) !== 'none'
}

export function compareText(a: string, b: string): number {
  const left = a.toLowerCase()
  const right = b.toLowerCase()
  if (left < right) return -1
  if (left > right) return 1
  return 0
}

/**
 * Rank candidates against the typed prefix.
 * Drops duplicates and candidates that do not match a non-empty prefix.
 */
export function rankCandidates(candidates: Candidate[], partial: string | null): RankedCandidate[] {
  const ranked: RankedCandidate[] = deduplicateCandidates(candidates)
    .map((candidate) => ({ ...candidate, matchType: computeMatchType(candidate.text, partial) }))
    .filter((candidate) => !partial || candidate.matchType !== 'none')

  // Array.prototype.sort is stable
  return ranked.sort((a, b) => {
    const tier = MATCH_TIER[b.matchType] - MATCH_TIER[a.matchType]
    if (tier !== 0) return tier
    return compareText(a.text, b.text)
  })
}

/**
 * Remove candidates whose text was already produced. The first occurrence wins.
 */
export function deduplicateCandidates<T extends Candidate>(candidates: T[]): T[] {
  const seen = new Set<string>()
  const result: T[] = []
  for (const candidate of candidates) {
    if (seen.has(candidate.text)) continue
    seen.add(candidate.text)
    result.push(candidate)
  }
  return result
}

/**
 * Limit the number of candidates returned.
 */
export function limitCandidates<T>(candidates: T[], limit: number = DEFAULT_MAX_CANDIDATES): T[] {
  return candidates.slice(0, limit)
}
