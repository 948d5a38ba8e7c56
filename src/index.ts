export {
  findUniqueFiles,
  createStatefulWalker,
  validateConfig,
} from './core/stateful-walker';
export type { StatefulWalker } from './core/stateful-walker';
export { walkSync, SKIP_DIR } from './core/walk';
export type { WalkEntry, WalkVisitor } from './core/walk';
export {
  hashFileSync,
  defaultHasherFn,
  createHasherFn,
  DEFAULT_ALGORITHM,
} from './core/hash/file-hasher';
export {
  ValidationError,
  PathResolutionError,
  FileHashError,
} from './core/errors';
export {
  DuplicateReport,
  createDuplicateReport,
} from './core/report/duplicate-report';
export type {
  DuplicateGroup,
  ReportSummary,
} from './core/report/duplicate-report';
export {
  createIncludeFilter,
  matchPattern,
  isHiddenPath,
} from './utils/pattern-utils';
export type { IncludeFilterOptions } from './utils/pattern-utils';
export { findFiles, toFileRecord } from './find-files';
export type { FindOptions, FindDependencies, FileRecord } from './find-files';
export type {
  FindUniqueFilesConfig,
  StatefulFileInfo,
  Hasher,
  HasherFn,
  IncludeFileFn,
  FoundFileFn,
} from './interfaces/file-walker';
