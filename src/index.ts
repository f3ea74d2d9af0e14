export * from './SourceRange';
export * from './IgnorePrimitives';
export {
  createDirectiveMatcher,
  matchDirective,
  parseFileDirectives,
  parseFlatTargetList,
  DirectiveMatcher,
  TargetListParser
} from './DirectiveMatcher';
export { targetsApply, formatTargets } from './IgnoreIntervals';
export { FileAccessor, FileAccessError, FsFileAccessor } from './FileAccessor';
export { FileSnapshot, SnapshotStore, JsonSnapshotStore } from './SnapshotStore';
export { IgnoreRangeManager, IgnoreRangeManagerOptions } from './IgnoreRangeManager';
export { Diagnostic, FilterOutcome, affectedCode, parseDiagnostics, partitionDiagnostics } from './ResultFilter';
