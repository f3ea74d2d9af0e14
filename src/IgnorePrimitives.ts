// file: src/IgnorePrimitives.ts
/**
 * The kinds of ignore directives supported in source comments.
 */
export type DirectiveKind = 'Start' | 'Stop' | 'Inline';

/**
 * An analyzer, optionally narrowed to one of its rules, named by a directive.
 */
export interface Target {
  /** Analyzer name as written; `all` matches every analyzer. */
  analyzer: string;
  /** Rule qualifier from `analyzer(rule)`; absent means every rule. */
  rule?: string;
}

/**
 * A directive recognized in one line of text. An empty target list
 * suppresses every analyzer.
 */
export interface Directive {
  kind: DirectiveKind;
  targets: Target[];
}

/**
 * A directive together with the line it was found on.
 */
export interface LineDirective extends Directive {
  /** The 1-based line number where the directive appears. */
  line: number;
}

/** Last line of an interval, or `open` when it runs to the end of the file. */
export type IntervalEnd = number | 'open';

/**
 * A resolved suppression region covering whole lines.
 */
export interface IgnoreInterval {
  /** The directive kind that opened the interval. */
  origin: 'Start' | 'Inline';
  startLine: number;
  endLine: IntervalEnd;
  targets: Target[];
}

/**
 * The analyzer and rule that produced a result.
 */
export interface ResultOrigin {
  analyzer: string;
  rule?: string;
}
