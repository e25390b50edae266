/**
 * Confidence scoring for lexical pattern matches.
 *
 * score = base + heuristic(pattern) + richness bonus - comment/decorator penalties,
 * clamped to [0, 1]. Heuristics are looked up by pattern name; unknown names
 * fall back to a heuristic that adds nothing.
 */
import type { IndicatorHit } from './types.js';

export interface ConfidenceTuning {
  /** Score of any indicator hit before adjustments */
  readonly baseScore: number;
  /** Minimum score for gated patterns */
  readonly acceptanceThreshold: number;
  /** Lines on either side of the hit that heuristics may inspect */
  readonly proximityWindow: number;
  /** Added when a keyword of the pattern name appears near the hit */
  readonly richnessBonus: number;
  /** Hit text carries a decorator/annotation marker */
  readonly decoratorPenalty: number;
  /** Hit sits inside a comment or doc line */
  readonly commentPenalty: number;
  /** Line directly above the hit is a comment or doc line */
  readonly adjacentCommentPenalty: number;
}

export const CONFIDENCE_TUNING: ConfidenceTuning = Object.freeze({
  baseScore: 0.5,
  acceptanceThreshold: 0.7,
  proximityWindow: 3,
  richnessBonus: 0.05,
  decoratorPenalty: 0.2,
  commentPenalty: 0.3,
  adjacentCommentPenalty: 0.1,
});

/** Patterns whose lexical signature is noisy enough to need the acceptance threshold. */
export const DEFAULT_GATED_PATTERNS: readonly string[] = ['singleton'];

/**
 * What a heuristic gets to look at.
 */
export interface ScoringContext {
  readonly hit: IndicatorHit;
  readonly patternName: string;
  readonly content: string;
  readonly lines: readonly string[];
  /**
   * Lines within the proximity window, hit line included, joined by newlines.
   * Lines excluded for the pattern are left out.
   */
  readonly window: string;
}

export type PatternHeuristic = (ctx: ScoringContext) => number;

const noHeuristic: PatternHeuristic = () => 0;

// `if cls._instance is None:`, `if not cls._instance:`, `if (!Config.instance)`
const INSTANCE_GUARD =
  /\bif\b.*instance.*(?:\bis\s+None\b|[!=]==?\s*(?:None|null|undefined)\b)|\bif\s+not\s+[\w.]*instance\b|\bif\s*\(\s*!\s*[\w.]*instance\b/i;
const CONSTRUCTOR_OVERRIDE = /__new__|\bgetInstance\b|\bprivate\s+constructor\b/;

function scoreSingleton({ window }: ScoringContext): number {
  if (!INSTANCE_GUARD.test(window)) return 0;
  // A constructor override only corroborates a guard
  return CONSTRUCTOR_OVERRIDE.test(window) ? 0.5 : 0.3;
}

function scoreFactory({ window }: ScoringContext): number {
  let score = 0;
  const low = window.toLowerCase();
  if (low.includes('create') && /\breturn\b/.test(window)) {
    score += 0.3;
  }
  if (window.includes('Factory')) {
    score += 0.2;
  }
  return score;
}

function scoreObserver({ window }: ScoringContext): number {
  const low = window.toLowerCase();
  return low.includes('observer') && (low.includes('notify') || low.includes('update')) ? 0.4 : 0;
}

function scoreRepository({ window }: ScoringContext): number {
  const low = window.toLowerCase();
  return low.includes('repository') && ['find', 'save', 'delete'].some((op) => low.includes(op))
    ? 0.4
    : 0;
}

function scoreGodClass({ content }: ScoringContext): number {
  const methodCount = (content.match(/\b(?:def|function)\s+\w+/g) ?? []).length;
  return methodCount > 10 ? Math.min(0.4, methodCount * 0.02) : 0;
}

/**
 * Strategy table: pattern name -> heuristic.
 */
export const PATTERN_HEURISTICS: ReadonlyMap<string, PatternHeuristic> = new Map([
  ['singleton', scoreSingleton],
  ['factory', scoreFactory],
  ['observer', scoreObserver],
  ['repository', scoreRepository],
  ['god_class', scoreGodClass],
]);

export function getHeuristic(patternName: string): PatternHeuristic {
  return PATTERN_HEURISTICS.get(patternName) ?? noHeuristic;
}

const COMMENT_LINE = /^\s*(?:#|\/\/|\/\*|\*|"""|''')/;
const TRAILING_COMMENT = /(?:^|\s)(?:#|\/\/)/;

/**
 * Whether a line is a comment or documentation line.
 */
export function isCommentLine(line: string): boolean {
  return COMMENT_LINE.test(line);
}

function isInsideComment(line: string, index: number): boolean {
  if (isCommentLine(line)) return true;
  const marker = TRAILING_COMMENT.exec(line);
  return marker !== null && index >= marker.index;
}

function patternKeywords(patternName: string): string[] {
  return patternName
    .toLowerCase()
    .split('_')
    .filter((k) => k.length >= 3);
}

export interface ConfidenceOptions {
  /** Pre-split content, to avoid splitting once per hit */
  lines?: readonly string[];
  /** Lines (1-based) the pattern skips; heuristics do not see them either */
  excludedLines?: ReadonlySet<number>;
  tuning?: ConfidenceTuning;
}

/**
 * Score a lexical hit. Always returns a value in [0, 1].
 */
export function calculateConfidence(
  hit: IndicatorHit,
  content: string,
  patternName: string,
  options: ConfidenceOptions = {}
): number {
  const tuning = options.tuning ?? CONFIDENCE_TUNING;
  const lines = options.lines ?? content.split('\n');
  const lineIdx = hit.lineNumber - 1;
  const line = lines[lineIdx] ?? '';

  const from = Math.max(0, lineIdx - tuning.proximityWindow);
  const to = Math.min(lines.length, lineIdx + tuning.proximityWindow + 1);
  const excluded = options.excludedLines;
  const windowLines: string[] = [];
  const surroundingLines: string[] = [];
  for (let i = from; i < to; i++) {
    if (i !== lineIdx && excluded?.has(i + 1)) continue;
    const text = lines[i] ?? '';
    windowLines.push(text);
    if (i !== lineIdx) surroundingLines.push(text);
  }

  let score = tuning.baseScore;
  score += getHeuristic(patternName)({
    hit,
    patternName,
    content,
    lines,
    window: windowLines.join('\n'),
  });

  const surrounding = surroundingLines.join('\n').toLowerCase();
  if (patternKeywords(patternName).some((k) => surrounding.includes(k))) {
    score += tuning.richnessBonus;
  }

  if (/@\w+/.test(hit.text)) {
    score -= tuning.decoratorPenalty;
  }
  if (isInsideComment(line, hit.index)) {
    score -= tuning.commentPenalty;
  }
  if (lineIdx > 0 && isCommentLine(lines[lineIdx - 1] ?? '')) {
    score -= tuning.adjacentCommentPenalty;
  }

  return clampConfidence(score);
}

export function clampConfidence(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.max(0, Math.min(1, score));
}

/**
 * Gated patterns must reach the acceptance threshold; all others pass.
 */
export function passesConfidenceGate(
  patternName: string,
  confidence: number,
  gatedPatterns: ReadonlySet<string>,
  threshold: number = CONFIDENCE_TUNING.acceptanceThreshold
): boolean {
  return !gatedPatterns.has(patternName) || confidence >= threshold;
}
