/**
 * SearchEngine: plain, wildcard and regex queries over a SearchIndex
 * snapshot, ranked and capped.
 */

import { RE2JS } from "re2js";
import { JsonSearchError } from "../errors";
import { SCORE_WEIGHTS, SEARCH_DEFAULTS } from "../config/constants";
import { mergeSearchPolicy, type SearchPolicy } from "../config/SearchPolicy";
import type { JsonPath } from "../document/JsonPath";
import { throwIfAborted, yieldToEventLoop } from "../utils/cancellation";
import { createLogger } from "../utils/logger";
import type { LazyTree } from "../tree/LazyTree";
import {
  buildSearchIndex,
  ngramsOf,
  SearchIndex,
  type MatchKind,
  type SearchIndexEntry,
  type SearchIndexStats,
} from "./SearchIndex";

const log = createLogger({ component: "SearchEngine" });

export type SearchMode = "plain" | "wildcard" | "regex";

export interface SearchOptions {
  caseSensitive?: boolean;
  mode?: SearchMode;
  searchKeys?: boolean;
  searchValues?: boolean;
  searchPaths?: boolean;
  maxResults?: number;
}

export interface SearchResult {
  path: JsonPath;
  pathKey: string;
  displayPath: string;
  key: string;
  matchKind: MatchKind;
  matchedText: string;
  matchStart: number;
  matchLength: number;
  /** The match with up to `contextChars` either side */
  context: string;
  score: number;
}

export interface SearchEngineDeps {
  now?: () => number;
}

interface Match {
  start: number;
  length: number;
  exact: boolean;
}

type Matcher = (content: string) => Match | null;

const YIELD_EVERY = 2_000;

export function scoreMatch(kind: MatchKind, exact: boolean, depth: number): number {
  const shallowness = Math.max(0, SCORE_WEIGHTS.SHALLOW_DEPTH - depth) * SCORE_WEIGHTS.SHALLOW_STEP;
  return SCORE_WEIGHTS[kind] + (exact ? SCORE_WEIGHTS.EXACT_BONUS : 0) + shallowness;
}

/**
 * Display window around a match. Short content is returned whole; longer
 * content is cut `contextChars` either side, with "..." where cut.
 */
export function buildContext(
  content: string,
  start: number,
  length: number,
  contextChars: number = SEARCH_DEFAULTS.CONTEXT_CHARS
): string {
  if (content.length <= SEARCH_DEFAULTS.CONTEXT_FULL_MAX) return content;
  const from = Math.max(0, start - contextChars);
  const to = Math.min(content.length, start + length + contextChars);
  return (from > 0 ? "..." : "") + content.slice(from, to) + (to < content.length ? "..." : "");
}

/**
 * `*` matches any run, `?` any one character; the whole content must match.
 * Compiled for RE2JS like regex queries.
 */
export function wildcardToPattern(pattern: string, caseSensitive: boolean): RE2JS {
  let source = "";
  for (const ch of pattern) {
    if (ch === "*") source += ".*";
    else if (ch === "?") source += ".";
    else source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  }
  return RE2JS.compile(`^${source}$`, RE2JS.DOTALL | (caseSensitive ? 0 : RE2JS.CASE_INSENSITIVE));
}

/**
 * Offset in `content` of each UTF-16 unit of `content.toLowerCase()`.
 * Lowercasing can lengthen a character ("İ" becomes two units), so
 * positions found in the lowered text are mapped back through this.
 */
function loweredOffsets(content: string): number[] {
  const offsets: number[] = [];
  let original = 0;
  for (const ch of content) {
    const units = ch.toLowerCase().length;
    for (let k = 0; k < units; k++) offsets.push(original);
    original += ch.length;
  }
  offsets.push(original);
  return offsets;
}

function plainMatcher(query: string, caseSensitive: boolean): Matcher {
  if (caseSensitive) {
    return (content) => {
      const start = content.indexOf(query);
      return start === -1 ? null : { start, length: query.length, exact: content === query };
    };
  }

  const needle = query.toLowerCase();
  return (content) => {
    const haystack = content.toLowerCase();
    const found = haystack.indexOf(needle);
    if (found === -1) return null;
    const exact = haystack === needle;
    if (haystack.length === content.length) return { start: found, length: needle.length, exact };

    const offsets = loweredOffsets(content);
    const start = offsets[found];
    // End after the whole character holding the last matched unit
    const last = offsets[found + needle.length - 1];
    const end = last + ((content.codePointAt(last) ?? 0) > 0xffff ? 2 : 1);
    return { start, length: end - start, exact };
  };
}

/**
 * Regex queries run on RE2JS, whose matching time grows linearly with the
 * input. Lookaround and backreferences are not part of its syntax and are
 * rejected as invalid patterns.
 */
function regexMatcher(query: string, caseSensitive: boolean): Matcher {
  let pattern: RE2JS;
  try {
    pattern = RE2JS.compile(query, caseSensitive ? 0 : RE2JS.CASE_INSENSITIVE);
  } catch (error) {
    throw JsonSearchError.invalidPattern(query, error instanceof Error ? error : undefined);
  }
  return (content) => {
    const found = pattern.matcher(content);
    if (!found.find()) return null;
    const start = found.start();
    const length = found.end() - start;
    return { start, length, exact: length === content.length };
  };
}

function wildcardMatcher(query: string, caseSensitive: boolean): Matcher {
  const pattern = wildcardToPattern(query, caseSensitive);
  const literal = !query.includes("*") && !query.includes("?");
  return (content) => (pattern.matches(content) ? { start: 0, length: content.length, exact: literal } : null);
}

/**
 * Entry ids that can contain `needle` (lowercased): whole-content tokens
 * containing it, plus the postings of its rarest n-gram for long values.
 */
function plainCandidates(index: SearchIndex, needle: string): number[] {
  const ids = new Set<number>();
  for (const [token, posting] of index.terms) {
    if (token.includes(needle)) for (const id of posting) ids.add(id);
  }

  if (needle.length >= index.policy.ngramSize) {
    let rarest: readonly number[] | undefined;
    for (const gram of ngramsOf(needle, index.policy.ngramSize)) {
      const posting = index.grams.get(gram);
      if (!posting) {
        rarest = [];
        break;
      }
      if (!rarest || posting.length < rarest.length) rarest = posting;
    }
    for (const id of rarest ?? []) ids.add(id);
  } else {
    // Too short for n-grams: every long value is a candidate
    for (const id of index.ngrammed) ids.add(id);
  }

  return [...ids].sort((a, b) => a - b);
}

export class SearchEngine {
  readonly policy: SearchPolicy;
  private snapshot: SearchIndex | null = null;
  private readonly now: () => number;

  constructor(policy: Partial<SearchPolicy> = {}, deps: SearchEngineDeps = {}) {
    this.policy = mergeSearchPolicy(policy);
    this.now = deps.now ?? Date.now;
  }

  get index(): SearchIndex | null {
    return this.snapshot;
  }

  /** Build a fresh index from `tree` and swap it in. */
  async rebuild(tree: LazyTree, signal?: AbortSignal): Promise<SearchIndexStats> {
    const next = await buildSearchIndex(tree, { signal, policy: this.policy });
    this.snapshot = next;
    return next.getStats();
  }

  setIndex(index: SearchIndex | null): void {
    this.snapshot = index;
  }

  getStats(): SearchIndexStats | null {
    return this.snapshot?.getStats() ?? null;
  }

  clear(): void {
    this.snapshot = null;
  }

  /**
   * Run `query` against the index as it is when the call starts. A rebuild
   * during the search does not affect it.
   */
  async search(query: string, options: SearchOptions = {}, signal?: AbortSignal): Promise<SearchResult[]> {
    const index = this.snapshot ?? SearchIndex.empty(this.policy);
    const mode = options.mode ?? "plain";
    const caseSensitive = options.caseSensitive ?? false;
    const maxResults = options.maxResults ?? this.policy.maxResults;
    const enabled: Record<MatchKind, boolean> = {
      key: options.searchKeys ?? true,
      value: options.searchValues ?? true,
      path: options.searchPaths ?? false,
    };

    if (query.length < this.policy.minQueryLength) return [];
    throwIfAborted(signal, "search", { query });

    const matcher =
      mode === "regex"
        ? regexMatcher(query, caseSensitive)
        : mode === "wildcard"
          ? wildcardMatcher(query, caseSensitive)
          : plainMatcher(query, caseSensitive);

    const candidates = mode === "plain" ? plainCandidates(index, query.toLowerCase()) : null;
    const total = candidates ? candidates.length : index.entries.length;
    const started = this.now();
    const deadline = started + this.policy.regexTimeoutMs;
    const timed = mode !== "plain";
    const best = new Map<string, SearchResult>();

    for (let i = 0; i < total; i++) {
      if (timed && this.now() > deadline) {
        log.warn("Search timed out", { query, mode, scanned: i });
        throw JsonSearchError.timeout(query, this.policy.regexTimeoutMs);
      }
      if (i > 0 && i % YIELD_EVERY === 0) {
        await yieldToEventLoop();
        throwIfAborted(signal, "search", { query });
      }

      const entry: SearchIndexEntry | undefined = index.entries[candidates ? candidates[i] : i];
      if (!entry || !enabled[entry.matchKind]) continue;

      const match = matcher(entry.content);
      if (!match) continue;

      const score = scoreMatch(entry.matchKind, match.exact, entry.depth);
      const previous = best.get(entry.pathKey);
      if (previous && previous.score >= score) continue;

      best.set(entry.pathKey, {
        path: entry.path,
        pathKey: entry.pathKey,
        displayPath: entry.displayPath,
        key: entry.key,
        matchKind: entry.matchKind,
        matchedText: entry.content.slice(match.start, match.start + match.length),
        matchStart: match.start,
        matchLength: match.length,
        context: buildContext(entry.content, match.start, match.length, this.policy.contextChars),
        score,
      });
    }

    const results = [...best.values()].sort((a, b) => b.score - a.score).slice(0, maxResults);
    log.debug("Search finished", { query, mode, results: results.length, elapsedMs: this.now() - started });
    return results;
  }
}
