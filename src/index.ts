export type {
  Segment,
  LiteralSegment,
  SlotSegment,
  Pattern,
  ExtractedVersion,
  Tag,
  MatchResult,
  NoMatchReason,
  Classification,
  UpdateSet,
  ImageName,
  ImageReference,
  CheckTarget,
  ImageResult,
  UpdateLevel,
  Report,
  ReportSummary,
  TagFetcher,
  CliOptions,
  ParsedDockerfile,
  ParsedCompose,
} from './types/index.js';

export {
  compilePattern,
  matchTag,
  filterTags,
  compareVersions,
  classifyUpdates,
  extractCurrent,
} from './pattern/index.js';
export {
  TagwatchError,
  PatternSyntaxError,
  CurrentTagMismatchError,
  RegistryError,
  ManifestError,
} from './errors.js';
export { DockerHubTagFetcher } from './registry/dockerhub.js';
export { buildDockerfileTargets, buildComposeTargets, dockerfileTargets, composeTargets } from './context.js';
export { runChecks, updateLevel, exitCodeFor, EXIT_CODES } from './runner.js';
export { parseDockerfile } from './parsers/dockerfile.js';
export { parseCompose } from './parsers/compose.js';
export { parseDirective } from './parsers/directive.js';
export { parseImageReference } from './parsers/image.js';
export { formatReport, formatFailures, formatUpdates, formatSummary } from './ui/reporter.js';
