/**
 * Resolution pipeline
 * One task per title: lookup → (translate → lookup) → select → record.
 * Tasks run concurrently behind an admission gate; no error crosses a task.
 */

import { createLogger, errorMessage } from '../shared/log.js';
import type {
  AmbiguityResolver,
  CandidateMatch,
  MovieLookup,
  PipelineResult,
  ResolvedMovie,
  TitleEntry,
  TitleOutcome,
  TitleTranslator,
} from '../shared/types.js';
import { AdmissionGate } from './gate.js';
import { ResultBag } from './resultBag.js';
import { selectMatch, toResolvedMovie } from './selector.js';

const log = createLogger('resolve');

const DEFAULT_CONCURRENCY = 5;

export interface PipelineOptions {
  /** Max titles in flight at once. Default: 5. */
  concurrency?: number;
  /** Translation fallback; omitted or null disables the second lookup. */
  translator?: TitleTranslator | null;
  sourceLang?: string;
  targetLang?: string;
  /** Manual pick for ambiguous sets. Without it the top candidate wins. */
  resolveAmbiguous?: AmbiguityResolver;
  /** Fired after each title reaches a terminal state. */
  onProgress?: (done: number, total: number) => void;
}

interface Bags {
  resolved: ResultBag<ResolvedMovie>;
  unresolved: ResultBag<TitleEntry>;
  ambiguous: ResultBag<TitleEntry>;
  outcomes: ResultBag<TitleOutcome>;
}

interface Attempted {
  candidates: CandidateMatch[];
  translatedTo?: string;
}

export class ResolutionPipeline {
  private readonly gate: AdmissionGate;
  // prompts are serialized even though lookups are not
  private readonly promptGate = new AdmissionGate(1);
  private readonly translator: TitleTranslator | null;
  private readonly sourceLang: string;
  private readonly targetLang: string;

  constructor(private readonly lookup: MovieLookup, private readonly opts: PipelineOptions = {}) {
    this.gate = new AdmissionGate(opts.concurrency ?? DEFAULT_CONCURRENCY);
    this.translator = opts.translator ?? null;
    this.sourceLang = opts.sourceLang ?? 'es';
    this.targetLang = opts.targetLang ?? 'en';
  }

  async run(entries: Iterable<TitleEntry>): Promise<PipelineResult> {
    const unique = [...new Set(entries)];
    const bags: Bags = {
      resolved: new ResultBag(),
      unresolved: new ResultBag(),
      ambiguous: new ResultBag(),
      outcomes: new ResultBag(),
    };

    let done = 0;
    await Promise.all(
      unique.map((entry) =>
        this.gate.use(async () => {
          await this.resolveEntry(entry, bags);
          done++;
          this.reportProgress(done, unique.length);
        })
      )
    );

    return {
      resolved: bags.resolved.drain(),
      unresolved: bags.unresolved.drain(),
      ambiguous: bags.ambiguous.drain(),
      outcomes: bags.outcomes.drain(),
    };
  }

  private reportProgress(done: number, total: number): void {
    try {
      this.opts.onProgress?.(done, total);
    } catch (err) {
      log.warn(`Progress callback failed: ${errorMessage(err)}`);
    }
  }

  private async resolveEntry(entry: TitleEntry, bags: Bags): Promise<void> {
    log.info(`Processing: ${entry}`);

    let attempted: Attempted = { candidates: [] };
    try {
      attempted = await this.attemptLookups(entry);
      const selection = selectMatch(attempted.candidates);

      if (selection.kind === 'none') {
        log.warn(`No results found for: ${entry}`);
        this.recordUnresolved(entry, bags, attempted);
        return;
      }

      let match: CandidateMatch | null = selection.match;
      if (selection.ambiguous) {
        log.warn(`More than 1 results found for: ${entry}`);
        const pick = this.opts.resolveAmbiguous;
        if (pick) {
          const candidates = attempted.candidates;
          match = await this.promptGate.use(() => pick(entry, candidates));
        }
      }

      if (!match) {
        log.info(`Skipped: ${entry}`);
        this.recordUnresolved(entry, bags, attempted);
        return;
      }

      const movie = toResolvedMovie(match);
      bags.resolved.append(movie);
      if (selection.ambiguous) bags.ambiguous.append(entry);
      bags.outcomes.append({
        entry,
        status: 'resolved',
        ambiguous: selection.ambiguous,
        candidates: attempted.candidates.length,
        translatedTo: attempted.translatedTo,
        match: movie,
      });
    } catch (err) {
      const message = errorMessage(err);
      log.error(`Failed processing ${entry}: ${message}`);
      this.recordUnresolved(entry, bags, attempted, message);
    }
  }

  private async attemptLookups(entry: TitleEntry): Promise<Attempted> {
    const first = await this.lookup.lookup(entry);
    if (first.length > 0 || !this.translator) return { candidates: first };

    const translated = await this.translator.translate(entry, this.sourceLang, this.targetLang);
    if (translated.toLowerCase() === entry.toLowerCase()) return { candidates: first };

    return { candidates: await this.lookup.lookup(translated), translatedTo: translated };
  }

  private recordUnresolved(entry: TitleEntry, bags: Bags, attempted: Attempted, error?: string): void {
    bags.unresolved.append(entry);
    bags.outcomes.append({
      entry,
      status: 'unresolved',
      ambiguous: false,
      candidates: attempted.candidates.length,
      translatedTo: attempted.translatedTo,
      error,
    });
  }
}
