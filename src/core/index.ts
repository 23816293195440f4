/**
 * Core module exports
 *
 * The preprocessing library behind the CLI.
 */

// Types
export {
  type OutputFormat,
  type ImageFormat,
  type SourceKind,
  type SourceDescriptor,
  type RenderParams,
  type ResolutionError,
  type ResolutionErrorKind,
  type ResolutionResult,
  type ResolutionStatus,
  type Logger,
  OUTPUT_FORMATS,
  isOutputFormat,
  imageFormatFor,
  describeImageReference,
} from './types';

// Errors
export { FilterError, type FilterErrorCode } from './errors';

// Configuration
export {
  type FilterConfig,
  type PartialFilterConfig,
  DEFAULT_CONFIG,
  DEFAULT_ASSET_DIR,
  defaultConfig,
  mergeConfig,
  parseConfig,
  loadConfig,
  applyMetadata,
} from './config';

// Preprocessor
export {
  preprocess,
  errorMarker,
  type PreprocessorContext,
  type PreprocessResult,
} from './preprocessor';

// Annotations
export {
  type Visibility,
  type AnnotationSettings,
  type DocumentAccumulator,
  annotationDefaults,
  resolveAnnotationSettings,
} from './annotations';
export { templatesFor, type FormatTemplates } from './formats';

// Word count
export { countWords, formatWordCount, type WordCount } from './wordCount';

// pandoc utilities
export {
  buildPandocArgs,
  defaultOutputPath,
  runPandoc,
  type PandocOptions,
} from './pandoc';

// Asset pipeline
export { AssetResolver, DEFAULT_FONT, type AssetResolverOptions } from './assets/resolver';
export {
  ExternalTools,
  CommandError,
  execFileRunner,
  fetchUrl,
  type ToolInvoker,
  type ToolResult,
  type CommandRunner,
  type UrlFetcher,
  type ExternalToolsOptions,
} from './assets/tools';
export { KeyedLock } from './assets/keyedLock';
export { addressOf } from './assets/contentAddress';
export { isStale } from './assets/freshness';
