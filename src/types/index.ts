// ── Pattern engine ──────────────────────────────────────────────────────────

export interface LiteralSegment {
  kind: 'literal';
  text: string;
}

export interface SlotSegment {
  kind: 'slot';
  breaking: boolean;
}

export type Segment = LiteralSegment | SlotSegment;

export interface Pattern {
  readonly source: string;
  readonly segments: readonly Segment[];
  readonly slotCount: number;
}

/** One unsigned integer per slot, in the order the slots appear in the pattern. */
export type ExtractedVersion = readonly number[];

export type Tag = string;

export type NoMatchReason = 'literal-mismatch' | 'missing-digits' | 'number-overflow' | 'trailing-input';

export type MatchResult =
  | { matched: true; version: ExtractedVersion }
  | { matched: false; reason: NoMatchReason; offset: number };

export type Classification = 'no-change' | 'compatible' | 'breaking';

export interface UpdateSet {
  breaking: Tag[];
  compatible: Tag[];
  /** Candidates that did not match the pattern. */
  unmatched: number;
}

// ── Image references ────────────────────────────────────────────────────────

export interface ImageName {
  registry?: string;
  namespace?: string;
  repository: string;
}

export interface ImageReference {
  raw: string;
  name: ImageName;
  tag: Tag;
  digest?: string;
}

// ── Manifests ───────────────────────────────────────────────────────────────

export interface Directive {
  pattern?: string;
  error?: string;
}

export interface DockerfileStage {
  name?: string;
  baseImage: string;
  startLine: number;
  directive?: Directive;
}

export interface ParsedDockerfile {
  path: string;
  stages: DockerfileStage[];
}

export interface ComposeBuild {
  context: string;
  dockerfile?: string;
}

export interface ComposeService {
  name: string;
  image?: string;
  imageLine?: number;
  build?: ComposeBuild;
  directive?: Directive;
}

export interface ParsedCompose {
  path: string;
  services: ComposeService[];
}

// ── Checks ──────────────────────────────────────────────────────────────────

interface TargetBase {
  /** Compose service the reference belongs to, if any. */
  service?: string;
  image: string;
  location: string;
  line?: number;
}

export type CheckTarget =
  | (TargetBase & { kind: 'image'; reference: ImageReference; pattern: string })
  | (TargetBase & { kind: 'skipped'; reason: string })
  | (TargetBase & { kind: 'invalid'; error: string });

export type UpdateLevel = 'none' | 'compatible' | 'breaking' | 'failure';

export type ImageResult =
  | (TargetBase & {
      status: 'checked';
      currentTag: Tag;
      pattern: string;
      updates: UpdateSet;
      level: Exclude<UpdateLevel, 'failure'>;
    })
  | (TargetBase & { status: 'failed'; error: string })
  | (TargetBase & { status: 'skipped'; reason: string });

export interface ReportSummary {
  checked: number;
  breaking: number;
  compatible: number;
  upToDate: number;
  failed: number;
  skipped: number;
}

export interface Report {
  path: string;
  timestamp: string;
  version: string;
  results: ImageResult[];
  summary: ReportSummary;
  level: UpdateLevel;
}

export interface TagFetcher {
  fetchTags(image: ImageName, opts?: { limit?: number; signal?: AbortSignal }): Promise<Tag[]>;
}

export interface CliOptions {
  json?: boolean;
  pattern?: string;
  concurrency?: number;
  timeout?: number;
  registry?: string;
}
