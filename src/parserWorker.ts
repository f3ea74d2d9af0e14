import { parseFileDirectives } from './DirectiveMatcher';
import { LineDirective } from './IgnorePrimitives';

/**
 * Worker task: find the ignore directives in a file.
 * @param filePath Path to the source file.
 * @returns Directives in line order.
 */
export default async function parserWorker(filePath: string): Promise<LineDirective[]> {
  return await parseFileDirectives(filePath);
}
