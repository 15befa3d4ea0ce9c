/**
 * Resource pattern matching.
 *
 * Patterns are '/'-separated. A literal segment matches itself, '*' inside a
 * segment matches any run of characters except '/', and a segment that is
 * exactly '**' matches zero or more whole segments.
 *
 *   orders/*      matches orders/42, not orders/42/items
 *   orders/**     matches orders, orders/42, orders/42/items
 *   docs/report-* matches docs/report-1
 */

import { LRUCache } from 'lru-cache';

type Segment =
    | { kind: 'literal'; value: string }
    | { kind: 'glob'; pieces: readonly string[] }
    | { kind: 'globstar' };

export interface Specificity {
    readonly exact: boolean;
    readonly literalChars: number;
    readonly globstars: number;
    readonly stars: number;
}

export interface CompiledPattern {
    readonly source: string;
    readonly specificity: Specificity;
    matches(resource: string): boolean;
}

const compiled = new LRUCache<string, CompiledPattern>({ max: 2_000 });

function compileSegment(segment: string): Segment {
    if (segment === '**') return { kind: 'globstar' };
    if (!segment.includes('*')) return { kind: 'literal', value: segment };
    return { kind: 'glob', pieces: segment.split('*') };
}

/**
 * Literal pieces around the stars: the first is a prefix, the last a suffix,
 * and each middle piece is taken at its leftmost fit. Linear in the part for
 * each piece, never backtracking.
 */
function matchGlob(pieces: readonly string[], part: string): boolean {
    const head = pieces[0] ?? '';
    const tail = pieces[pieces.length - 1] ?? '';
    if (part.length < head.length + tail.length) return false;
    if (!part.startsWith(head) || !part.endsWith(tail)) return false;

    const end = part.length - tail.length;
    let position = head.length;
    for (let i = 1; i < pieces.length - 1; i++) {
        const piece = pieces[i] ?? '';
        const found = part.indexOf(piece, position);
        if (found === -1 || found + piece.length > end) return false;
        position = found + piece.length;
    }
    return true;
}

function measure(pattern: string, segments: readonly Segment[]): Specificity {
    const globstars = segments.filter(s => s.kind === 'globstar').length;
    const stars = pattern.split('').filter(c => c === '*').length - globstars * 2;
    return {
        exact: globstars === 0 && stars === 0,
        literalChars: pattern.length - stars - globstars * 2,
        globstars,
        stars
    };
}

function matchSegments(segments: readonly Segment[], parts: readonly string[]): boolean {
    // memo[p][r]: pattern suffix from p matches resource suffix from r
    const memo = new Map<number, boolean>();
    const width = parts.length + 1;

    const step = (p: number, r: number): boolean => {
        const key = p * width + r;
        const known = memo.get(key);
        if (known !== undefined) return known;

        let result: boolean;
        const segment = segments[p];
        if (segment === undefined) {
            result = r === parts.length;
        } else if (segment.kind === 'globstar') {
            result = step(p + 1, r) || (r < parts.length && step(p, r + 1));
        } else {
            const part = parts[r];
            if (part === undefined) {
                result = false;
            } else if (segment.kind === 'literal') {
                result = segment.value === part && step(p + 1, r + 1);
            } else {
                result = matchGlob(segment.pieces, part) && step(p + 1, r + 1);
            }
        }

        memo.set(key, result);
        return result;
    };

    return step(0, 0);
}

export function compilePattern(pattern: string): CompiledPattern {
    const cached = compiled.get(pattern);
    if (cached) return cached;

    const segments = pattern.split('/').map(compileSegment);
    const result: CompiledPattern = Object.freeze({
        source: pattern,
        specificity: Object.freeze(measure(pattern, segments)),
        matches: (resource: string) => matchSegments(segments, resource.split('/'))
    });

    compiled.set(pattern, result);
    return result;
}

export function matchesResource(pattern: string, resource: string): boolean {
    return compilePattern(pattern).matches(resource);
}

/**
 * Orders specificities: negative when `a` is more specific than `b`.
 * Exact beats wildcard, then more literal characters, then fewer '**',
 * then fewer '*'.
 */
export function compareSpecificity(a: Specificity, b: Specificity): number {
    if (a.exact !== b.exact) return a.exact ? -1 : 1;
    if (a.literalChars !== b.literalChars) return b.literalChars - a.literalChars;
    if (a.globstars !== b.globstars) return a.globstars - b.globstars;
    return a.stars - b.stars;
}
