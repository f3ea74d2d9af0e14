// file: src/IgnoreIntervals.ts
import { IgnoreInterval, LineDirective, ResultOrigin, Target } from './IgnorePrimitives';
import { containsRange, createRange, LINE_END_COLUMN, SourceRange } from './SourceRange';

/** Analyzer name that stands for every analyzer. */
export const WILDCARD_ANALYZER = 'all';

function targetApplies(target: Target, origin: ResultOrigin): boolean {
  const analyzer = target.analyzer.toLowerCase();
  const analyzerMatches = analyzer === WILDCARD_ANALYZER || analyzer === origin.analyzer.toLowerCase();
  return analyzerMatches && (target.rule === undefined || target.rule === origin.rule);
}

/**
 * Whether a directive's targets cover a result from `origin`. An empty target
 * list covers everything.
 */
export function targetsApply(targets: readonly Target[], origin: ResultOrigin): boolean {
  return targets.length === 0 || targets.some(t => targetApplies(t, origin));
}

/**
 * True when the targets name every analyzer: none at all, or only bare `all`.
 */
export function isWildcardTargetList(targets: readonly Target[]): boolean {
  return targets.every(t => t.analyzer.toLowerCase() === WILDCARD_ANALYZER && t.rule === undefined);
}

/**
 * Order-insensitive key for a target list, used to pair stop with start.
 */
export function targetKey(targets: readonly Target[]): string {
  if (isWildcardTargetList(targets)) {
    return WILDCARD_ANALYZER;
  }
  const parts = targets.map(t => {
    const analyzer = t.analyzer.toLowerCase();
    return t.rule === undefined ? analyzer : `${analyzer}(${t.rule})`;
  });
  return Array.from(new Set(parts)).sort().join(',');
}

export function formatTargets(targets: readonly Target[]): string {
  if (targets.length === 0) {
    return WILDCARD_ANALYZER;
  }
  return targets.map(t => (t.rule === undefined ? t.analyzer : `${t.analyzer}(${t.rule})`)).join(', ');
}

/**
 * What a stop directive does to one open start: `close` ends it, `narrow`
 * ends only some of its targets and leaves `remaining` open, `none` leaves it
 * alone.
 */
export type StopEffect =
  | { kind: 'none' }
  | { kind: 'close' }
  | { kind: 'narrow'; remaining: Target[] };

function stopEnds(stop: Target, target: Target): boolean {
  return stop.analyzer.toLowerCase() === target.analyzer.toLowerCase()
    && (stop.rule === undefined || stop.rule === target.rule);
}

/**
 * Effect of a stop with `stopTargets` on an open start with `startTargets`.
 * A start naming every analyzer is only ended by a wildcard stop.
 */
export function stopEffect(stopTargets: readonly Target[], startTargets: readonly Target[]): StopEffect {
  if (isWildcardTargetList(stopTargets)) {
    return { kind: 'close' };
  }
  if (isWildcardTargetList(startTargets)) {
    return { kind: 'none' };
  }
  const remaining = startTargets.filter(t => !stopTargets.some(s => stopEnds(s, t)));
  if (remaining.length === startTargets.length) {
    return { kind: 'none' };
  }
  return remaining.length === 0 ? { kind: 'close' } : { kind: 'narrow', remaining };
}

function insertSorted(intervals: IgnoreInterval[], interval: IgnoreInterval): IgnoreInterval[] {
  const at = intervals.findIndex(i => i.startLine > interval.startLine);
  return at < 0
    ? [...intervals, interval]
    : [...intervals.slice(0, at), interval, ...intervals.slice(at)];
}

/**
 * Records a one-line interval for an inline directive, unless one is
 * already known for that line.
 */
export function addInlineInterval(intervals: IgnoreInterval[], directive: LineDirective): IgnoreInterval[] {
  if (intervals.some(i => i.origin === 'Inline' && i.startLine === directive.line)) {
    return intervals;
  }
  return insertSorted(intervals, {
    origin: 'Inline',
    startLine: directive.line,
    endLine: directive.line,
    targets: directive.targets
  });
}

/**
 * Folds one directive into the interval list. Directives must be applied in
 * ascending line order, each below every start already in the list.
 */
export function applyDirective(intervals: IgnoreInterval[], directive: LineDirective): IgnoreInterval[] {
  switch (directive.kind) {
    case 'Inline':
      return addInlineInterval(intervals, directive);
    case 'Start':
      return insertSorted(intervals, {
        origin: 'Start',
        startLine: directive.line,
        endLine: 'open',
        targets: directive.targets
      });
    case 'Stop': {
      // Targets the stop does not name carry on from the next line
      const reopened: IgnoreInterval[] = [];
      const closed = intervals.map((i): IgnoreInterval => {
        if (i.origin !== 'Start' || i.endLine !== 'open') return i;
        const effect = stopEffect(directive.targets, i.targets);
        if (effect.kind === 'none') return i;
        if (effect.kind === 'narrow') {
          reopened.push({ origin: 'Start', startLine: directive.line + 1, endLine: 'open', targets: effect.remaining });
        }
        return { ...i, endLine: directive.line };
      });
      return reopened.reduce(insertSorted, closed);
    }
  }
}

/**
 * The lines an interval covers, as a range of `file`. Open intervals reach
 * `horizon`, the last line known to be free of a closing stop.
 */
export function intervalRange(file: string, interval: IgnoreInterval, horizon: number): SourceRange {
  const endLine = interval.endLine === 'open' ? horizon : interval.endLine;
  return createRange(
    file,
    { line: interval.startLine, column: 0 },
    { line: Math.max(endLine, interval.startLine), column: LINE_END_COLUMN }
  );
}

/**
 * Whether any interval with targets applying to `origin` contains `range`.
 */
export function intervalsCover(
  intervals: readonly IgnoreInterval[],
  range: SourceRange,
  origin: ResultOrigin,
  horizon: number
): boolean {
  return intervals.some(i =>
    targetsApply(i.targets, origin) && containsRange(intervalRange(range.file, i, horizon), range)
  );
}
