/**
 * ================================================================================
 * SCORER - Weighted Ranking of Picker Items
 * ================================================================================
 *
 * Each plain term is scored per field with a pluggable FuzzyScorer and scaled
 * by the field's weight. Exact `name:` / `id:` / `tag:` filters add a bonus of
 * twice the field weight. Items are ordered by score, descending; equal scores
 * keep their load order.
 */

import { FieldWeights } from '../../config/types';
import { Instance } from '../../types';
import { matchesFilters, SearchQuery } from './query';

/**
 * Relevance of `term` in `text`, 0 for no match. Both arrive lower-cased.
 */
export type FuzzyScorer = (text: string, term: string) => number;

/**
 * Prefix 1, substring 0.75, in-order subsequence 0.25.
 */
export const defaultScorer: FuzzyScorer = (text, term) => {
    if (!term) return 0;
    if (text.startsWith(term)) return 1;
    if (text.includes(term)) return 0.75;

    let at = 0;
    for (const ch of text) {
        if (ch === term[at]) at++;
        if (at === term.length) return 0.25;
    }
    return 0;
};

type Field = keyof FieldWeights;

function fieldTexts(instance: Instance): Record<Field, string[]> {
    return {
        'name': [instance.name],
        'instance-id': [instance.instanceId],
        'tag': Object.values(instance.tags),
        'ip': [instance.privateIp ?? '', instance.publicIp ?? ''],
        'dns': [instance.privateDns ?? '', instance.publicDns ?? '']
    };
}

const FIELDS: Field[] = ['name', 'instance-id', 'tag', 'ip', 'dns'];

/**
 * Score of an instance for the query, or null when the query excludes it.
 * Every plain term must score above zero on some field.
 */
export function scoreItem(instance: Instance, query: SearchQuery, weights: FieldWeights, scorer: FuzzyScorer = defaultScorer): number | null {
    if (!matchesFilters(instance, query)) return null;

    const texts = fieldTexts(instance);
    let total = 0;

    for (const rawTerm of query.terms) {
        const term = rawTerm.toLowerCase();
        let termScore = 0;
        for (const field of FIELDS) {
            const best = Math.max(0, ...texts[field].map((text) => (text ? scorer(text.toLowerCase(), term) : 0)));
            termScore += best * weights[field];
        }
        if (termScore <= 0) return null;
        total += termScore;
    }

    if (query.name !== undefined && instance.name.toLowerCase() === query.name.toLowerCase()) {
        total += weights.name * 2;
    }
    if (query.instanceId !== undefined && instance.instanceId.toLowerCase() === query.instanceId.toLowerCase()) {
        total += weights['instance-id'] * 2;
    }
    total += Object.keys(query.tagFilters).length * weights.tag * 2;

    return total;
}

/**
 * Matching instances, best first.
 */
export function rankInstances(instances: Instance[], query: SearchQuery, weights: FieldWeights, scorer: FuzzyScorer = defaultScorer): Instance[] {
    const scored: { instance: Instance; score: number; index: number }[] = [];
    instances.forEach((instance, index) => {
        const score = scoreItem(instance, query, weights, scorer);
        if (score !== null) scored.push({ instance, score, index });
    });
    scored.sort((a, b) => b.score - a.score || a.index - b.index);
    return scored.map((s) => s.instance);
}

/**
 * Ranking for items without fields: every term must score on the row text.
 */
export function rankText<T>(items: T[], text: (item: T) => string, query: string, scorer: FuzzyScorer = defaultScorer): T[] {
    const terms = query.trim().toLowerCase().split(/\s+/).filter(Boolean);
    if (terms.length === 0) return [...items];

    const scored: { item: T; score: number; index: number }[] = [];
    items.forEach((item, index) => {
        const haystack = text(item).toLowerCase();
        let score = 0;
        for (const term of terms) {
            const s = scorer(haystack, term);
            if (s <= 0) return;
            score += s;
        }
        scored.push({ item, score, index });
    });
    scored.sort((a, b) => b.score - a.score || a.index - b.index);
    return scored.map((s) => s.item);
}
