/**
 * Watcher Module
 *
 * Source tree observation: path mapping, live watching and full scans.
 */

export {
  FolderWatcher,
  type WatchEvent,
  type WatcherConfig,
} from './folderWatcher.js';

export {
  PathMapper,
  VIDEO_EXTENSIONS,
  OUTPUT_EXTENSION,
  TEMP_SUFFIX,
  QUALITY_SUFFIXES,
  DEFAULT_IGNORE_PATTERNS,
  DEFAULT_VERSION_SUFFIX,
  parseIgnorePatterns,
  type PathMapperConfig,
} from './pathMapper.js';

export { scanTree, walkTree, type TreeEntry } from './scanner.js';
