import type { CanonicalRecord, MatchPolicy, MatchResult, MatchTier } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { foldTitle, similarityRatio } from '../normalize/text.js';

/**
 * Decide whether `candidate` denotes the same publication as a member of `population`.
 *
 * Tiers are tried strongest first and the first tier with any hit wins:
 *
 * 1. certain   equal DOIs
 * 2. high      equal normalized titles; years, when both known, within policy.yearTolerance
 * 3. probable  folded-title similarity ≥ policy.fuzzyThreshold, or a truncated title
 *              that is a prefix of the other; years, when both known, equal
 *
 * Within a tier the highest score wins and ties go to the earliest member,
 * so the result is reproducible for identical input. Two records with
 * different DOIs never match on title.
 */
export function match<T extends CanonicalRecord>(
    candidate: CanonicalRecord,
    population: readonly T[],
    policy: MatchPolicy = DEFAULT_CONFIG.matching
): MatchResult<T> | null {
    return (
        matchByDoi(candidate, population) ??
        matchByTitle(candidate, population, policy) ??
        matchFuzzy(candidate, population, policy)
    );
}

/**
 * Tier of a match between two records, or null. Same rules as `match`.
 */
export function compareRecords(
    a: CanonicalRecord,
    b: CanonicalRecord,
    policy: MatchPolicy = DEFAULT_CONFIG.matching
): MatchTier | null {
    return match(a, [b], policy)?.tier ?? null;
}

function matchByDoi<T extends CanonicalRecord>(candidate: CanonicalRecord, population: readonly T[]): MatchResult<T> | null {
    if (!candidate.doi) return null;

    const index = population.findIndex((member) => member.doi === candidate.doi);
    const record = population[index];
    return record ? { record, index, tier: 'certain', score: 1 } : null;
}

function matchByTitle<T extends CanonicalRecord>(
    candidate: CanonicalRecord,
    population: readonly T[],
    policy: MatchPolicy
): MatchResult<T> | null {
    if (!candidate.title) return null;

    const index = population.findIndex(
        (member) =>
            member.title === candidate.title &&
            !conflictingDois(candidate, member) &&
            yearsWithin(candidate.year, member.year, policy.yearTolerance)
    );
    const record = population[index];
    return record ? { record, index, tier: 'high', score: 1 } : null;
}

function matchFuzzy<T extends CanonicalRecord>(
    candidate: CanonicalRecord,
    population: readonly T[],
    policy: MatchPolicy
): MatchResult<T> | null {
    if (!candidate.title) return null;

    const folded = foldTitle(candidate.title);
    let best: MatchResult<T> | null = null;

    for (const [index, member] of population.entries()) {
        if (!member.title || conflictingDois(candidate, member)) continue;
        if (!yearsWithin(candidate.year, member.year, 0)) continue;

        const score = fuzzyScore(folded, candidate.truncated, foldTitle(member.title), member.truncated, policy);
        if (score >= policy.fuzzyThreshold && (best === null || score > best.score)) {
            best = { record: member, index, tier: 'probable', score };
        }
    }

    return best;
}

/**
 * Similarity of two folded titles. A truncated title that is a long enough
 * prefix of the other scores 1.
 */
function fuzzyScore(
    a: string,
    aTruncated: boolean,
    b: string,
    bTruncated: boolean,
    policy: MatchPolicy
): number {
    if (aTruncated && isTruncationOf(a, b, policy)) return 1;
    if (bTruncated && isTruncationOf(b, a, policy)) return 1;

    // ratio can never exceed shorter/longer; skip the edit distance when that already fails
    const shorter = Math.min(a.length, b.length);
    const longer = Math.max(a.length, b.length);
    if (longer > 0 && shorter / longer < policy.fuzzyThreshold) return 0;

    return similarityRatio(a, b);
}

function isTruncationOf(truncated: string, full: string, policy: MatchPolicy): boolean {
    return truncated.length >= policy.minTruncatedLength && full.startsWith(truncated);
}

function conflictingDois(a: CanonicalRecord, b: CanonicalRecord): boolean {
    return a.doi !== null && b.doi !== null && a.doi !== b.doi;
}

/**
 * True when either year is unknown or they differ by at most `tolerance`.
 */
function yearsWithin(a: number | null, b: number | null, tolerance: number): boolean {
    if (a === null || b === null) return true;
    return Math.abs(a - b) <= tolerance;
}
