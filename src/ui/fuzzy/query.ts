/**
 * ================================================================================
 * SEARCH QUERY - Picker Query Language
 * ================================================================================
 *
 * Whitespace-separated tokens; double quotes group, backslash escapes.
 *
 * TOKENS:
 * • web              - plain term, matched against name, id, IPs and tag values
 * • name:web id:i-0a - field-scoped substring filters
 * • state:running type:t3.* az:us-east-1a
 * • ip:10.0.* dns:*.internal
 * • tag:Env=prod     - exact tag value (tag:Env:prod also accepted)
 * • has:Team missing:Owner
 * • !stopped !state:stopped !name:old - negation
 */

import { Instance } from '../../types';

export interface SearchQuery {
    raw: string;
    terms: string[];
    name?: string;
    instanceId?: string;
    tagFilters: Record<string, string>;
    negative: string[];
    ipFilters: string[];
    dnsFilters: string[];
    state?: string;
    type?: string;
    az?: string;
    hasTags: string[];
    missingTags: string[];
}

/**
 * Split on spaces outside double quotes; a backslash escapes the next character.
 */
export function splitQuoted(text: string): string[] {
    const parts: string[] = [];
    let current = '';
    let inQuotes = false;
    let escapeNext = false;

    for (const ch of text) {
        if (escapeNext) {
            current += ch;
            escapeNext = false;
        } else if (ch === '\\') {
            escapeNext = true;
        } else if (ch === '"') {
            inQuotes = !inQuotes;
        } else if (ch === ' ' && !inQuotes) {
            if (current) parts.push(current);
            current = '';
        } else {
            current += ch;
        }
    }
    if (current) parts.push(current);
    return parts;
}

function splitPair(token: string, separators: string[]): [string, string] {
    const index = Math.min(...separators.map((s) => token.indexOf(s)).filter((i) => i >= 0));
    if (!Number.isFinite(index)) return [token, ''];
    return [token.slice(0, index), token.slice(index + 1)];
}

export function parseQuery(text: string): SearchQuery {
    const query: SearchQuery = {
        raw: text.trim(),
        terms: [],
        tagFilters: {},
        negative: [],
        ipFilters: [],
        dnsFilters: [],
        hasTags: [],
        missingTags: []
    };

    for (const token of splitQuoted(query.raw)) {
        if (token.startsWith('!')) {
            if (token.length > 1) query.negative.push(token.slice(1));
            continue;
        }
        if (!token.includes(':')) {
            query.terms.push(token);
            continue;
        }

        const [key, value] = splitPair(token, [':']);
        switch (key.toLowerCase()) {
            case 'name':
                query.name = value;
                break;
            case 'id':
                query.instanceId = value;
                break;
            case 'ip':
            case 'private-ip':
            case 'public-ip':
                query.ipFilters.push(value);
                break;
            case 'dns':
            case 'private-dns':
            case 'public-dns':
                query.dnsFilters.push(value);
                break;
            case 'state':
                query.state = value;
                break;
            case 'type':
                query.type = value;
                break;
            case 'az':
            case 'zone':
                query.az = value;
                break;
            case 'tag': {
                const [tagKey, tagValue] = splitPair(value, ['=', ':']);
                if (tagKey) query.tagFilters[tagKey] = tagValue;
                break;
            }
            case 'has':
                query.hasTags.push(value);
                break;
            case 'missing':
                query.missingTags.push(value);
                break;
            default:
                //? Unknown prefixes (e.g. a pasted URL) stay plain terms
                query.terms.push(token);
        }
    }

    return query;
}

export function isEmptyQuery(query: SearchQuery): boolean {
    return query.raw === '';
}

const escapeRegex = (text: string): string => text.replace(/[.+?^$()|[\]\\{}]/g, '\\$&');

/**
 * Case-insensitive match where `*` stands for any run of characters.
 */
export function matchesPattern(value: string | undefined, pattern: string): boolean {
    if (value === undefined) return false;
    const body = pattern.split('*').map(escapeRegex).join('.*');
    return new RegExp('^' + body + '$', 'i').test(value);
}

const contains = (value: string | undefined, part: string): boolean =>
    value !== undefined && value.toLowerCase().includes(part.toLowerCase());

const sameText = (a: string | undefined, b: string): boolean =>
    a !== undefined && a.toLowerCase() === b.toLowerCase();

/**
 * Whether an instance is excluded by one negated token.
 */
function negates(instance: Instance, token: string): boolean {
    if (!token.includes(':')) {
        return sameText(instance.state, token) || contains(instance.name, token);
    }
    const [key, value] = splitPair(token, [':']);
    switch (key.toLowerCase()) {
        case 'name':
            return contains(instance.name, value);
        case 'id':
            return contains(instance.instanceId, value);
        case 'state':
            return sameText(instance.state, value);
        case 'type':
            return matchesPattern(instance.instanceType, value);
        case 'az':
        case 'zone':
            return sameText(instance.availabilityZone, value);
        case 'tag': {
            const [tagKey, tagValue] = splitPair(value, ['=', ':']);
            const actual = instance.tags[tagKey];
            return actual !== undefined && contains(actual, tagValue);
        }
        default:
            return false;
    }
}

/**
 * The structured part of a query: every filter must hold. Plain terms are
 * left to the scorer.
 */
export function matchesFilters(instance: Instance, query: SearchQuery): boolean {
    if (query.negative.some((token) => negates(instance, token))) return false;
    if (query.name !== undefined && !contains(instance.name, query.name)) return false;
    if (query.instanceId !== undefined && !contains(instance.instanceId, query.instanceId)) return false;

    for (const [key, value] of Object.entries(query.tagFilters)) {
        if (instance.tags[key] !== value) return false;
    }
    for (const pattern of query.ipFilters) {
        if (!matchesPattern(instance.privateIp, pattern) && !matchesPattern(instance.publicIp, pattern)) return false;
    }
    for (const pattern of query.dnsFilters) {
        if (!matchesPattern(instance.privateDns, pattern) && !matchesPattern(instance.publicDns, pattern)) return false;
    }

    if (query.state !== undefined && !sameText(instance.state, query.state)) return false;
    if (query.type !== undefined && !matchesPattern(instance.instanceType, query.type)) return false;
    if (query.az !== undefined && !sameText(instance.availabilityZone, query.az)) return false;

    if (query.hasTags.some((tag) => !Object.hasOwn(instance.tags, tag))) return false;
    if (query.missingTags.some((tag) => Object.hasOwn(instance.tags, tag))) return false;
    return true;
}
