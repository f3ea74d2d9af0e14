// file: src/DirectiveValidator.ts
import { LineDirective } from './IgnorePrimitives';
import { formatTargets, isWildcardTargetList, stopEffect, targetKey } from './IgnoreIntervals';
import { LOG_PREFIX } from './logger';

/**
 * Checks that start/stop directives in one file pair up: every stop must
 * end at least one target of an open start, and a start must not repeat a
 * start for the same targets that is still open. A start left open is fine; it runs to the
 * end of the file.
 * @param directives Directives of one file, in line order.
 * @param filePath Path to the file (used for error messages).
 * @param report Function to call for each validation error message.
 * @returns Number of validation errors found.
 */
export function validateDirectivePairing(
  directives: LineDirective[],
  filePath: string,
  report: (msg: string) => void
): number {
  let open: LineDirective[] = [];
  let errors = 0;
  for (const d of directives) {
    if (d.kind === 'Start') {
      const key = targetKey(d.targets);
      const duplicate = open.find(s => targetKey(s.targets) === key);
      if (duplicate) {
        report(
          `${LOG_PREFIX} ${filePath}:${d.line} -> duplicate start ignoring ${formatTargets(d.targets)} ` +
          `(already open since line ${duplicate.line})`
        );
        errors++;
        continue;
      }
      open.push(d);
    } else if (d.kind === 'Stop') {
      let matched = false;
      const remaining: LineDirective[] = [];
      for (const s of open) {
        const effect = stopEffect(d.targets, s.targets);
        if (effect.kind === 'none') {
          remaining.push(s);
          continue;
        }
        matched = true;
        if (effect.kind === 'narrow') remaining.push({ ...s, targets: effect.remaining });
      }
      if (!matched) {
        const what = isWildcardTargetList(d.targets) ? '' : ` ${formatTargets(d.targets)}`;
        report(`${LOG_PREFIX} ${filePath}:${d.line} -> stop ignoring${what} without matching start ignoring`);
        errors++;
      }
      open = remaining;
    }
  }
  return errors;
}
