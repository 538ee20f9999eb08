/**
 * Shared types for list-resolver
 */

// ============================================================================
// Configuration
// ============================================================================

export interface ResolverConfig {
  concurrency: number;
  paths: PathsConfig;
  lookup: LookupConfig;
  translator: TranslatorConfig;
  selection: SelectionConfig;
  report: ReportConfig;
}

export interface PathsConfig {
  inputDir: string;
  outputDir: string;
  reportDir: string;
}

export interface LookupConfig {
  url: string;
  endpoint: string;
  apiKey: string;
  apiKeyFiles: string[];
  timeoutMs: number;
}

export interface TranslatorConfig {
  enabled: boolean;
  url: string;
  source: string;
  target: string;
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
}

export interface SelectionConfig {
  interactive: boolean;
}

export interface ReportConfig {
  enabled: boolean;
}

// ============================================================================
// Lookup results
// ============================================================================

/** "<title> (<year>)" as extracted from the list page */
export type TitleEntry = string;

export interface MovieImage {
  readonly coverType: string;
  readonly url?: string;
  readonly remoteUrl?: string;
}

/** One search result from the movie lookup API */
export interface CandidateMatch {
  readonly title?: string;
  readonly originalTitle?: string;
  readonly year?: number;
  readonly secondaryYear?: number;
  readonly imdbId?: string;
  readonly tmdbId?: number;
  readonly popularity?: number;
  readonly overview?: string;
  readonly genres?: readonly string[];
  readonly images: readonly MovieImage[];
  readonly remotePoster?: string;
}

/** Output record; key names are part of the export format */
export interface ResolvedMovie {
  Title: string | null;
  Poster_url: string;
  Imdb_id: string | null;
  Tmdb_id: number | null;
}

// ============================================================================
// Pipeline
// ============================================================================

export type OutcomeStatus = 'resolved' | 'unresolved';

export interface TitleOutcome {
  entry: TitleEntry;
  status: OutcomeStatus;
  ambiguous: boolean;
  candidates: number;
  translatedTo?: string;
  match?: ResolvedMovie;
  error?: string;
}

export interface PipelineResult {
  resolved: ResolvedMovie[];
  unresolved: TitleEntry[];
  ambiguous: TitleEntry[];
  outcomes: TitleOutcome[];
}

/** Lookup seam used by the pipeline */
export interface MovieLookup {
  lookup(term: string): Promise<CandidateMatch[]>;
}

/** Translation seam used by the pipeline */
export interface TitleTranslator {
  translate(text: string, sourceLang: string, targetLang: string): Promise<string>;
}

/**
 * Picks one candidate out of an ambiguous set, or null to skip the entry.
 */
export type AmbiguityResolver = (
  entry: TitleEntry,
  candidates: readonly CandidateMatch[]
) => Promise<CandidateMatch | null>;

// ============================================================================
// Outputs & run report
// ============================================================================

export interface OutputPaths {
  resolved: string;
  unresolved: string;
  ambiguous: string;
}

export interface RunSummary {
  runAt: string;
  input: string;
  total: number;
  resolved: number;
  unresolved: number;
  ambiguous: number;
  durationSec: number;
  outputs: OutputPaths;
  logPath?: string;
}
