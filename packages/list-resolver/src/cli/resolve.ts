/**
 * list-resolver [file]
 * Resolve every "<title> (<year>)" row of an exported list page and write the
 * resolved / not found / multiple match files.
 */

import fs from 'node:fs';
import path from 'node:path';

import { Command } from 'commander';

import { extractEntries } from '../extract/entries.js';
import { LookupClient } from '../lookup/lookupClient.js';
import { writeResults } from '../output/writer.js';
import { RunLogger } from '../report/runLogger.js';
import { ResolutionPipeline } from '../resolve/pipeline.js';
import { getConfigPath, loadConfig } from '../shared/config.js';
import { createLogger, errorMessage } from '../shared/log.js';
import type { PipelineResult, ResolverConfig, RunSummary } from '../shared/types.js';
import { Translator } from '../translate/translator.js';
import { createTerminalPrompt } from './prompt.js';

export const DEFAULT_INPUT_FILE = 'filmaffinity_list.html';

const log = createLogger('list-resolver');

export async function runResolve(config: ResolverConfig, inputFile: string): Promise<RunSummary | null> {
  const startedAt = Date.now();
  const inputPath = path.join(config.paths.inputDir, inputFile);

  if (!fs.existsSync(inputPath)) {
    log.error(`File not found: ${inputPath}`);
    return null;
  }

  const { entries } = extractEntries(fs.readFileSync(inputPath, 'utf-8'));
  if (entries.size === 0) {
    log.error('No movie data found in HTML file.');
    return null;
  }
  log.step(`Found ${entries.size} movies in the list`);

  const prompt = config.selection.interactive ? createTerminalPrompt() : null;
  const pipeline = new ResolutionPipeline(new LookupClient(config.lookup), {
    concurrency: config.concurrency,
    translator: config.translator.enabled ? new Translator(config.translator) : null,
    sourceLang: config.translator.source,
    targetLang: config.translator.target,
    resolveAmbiguous: prompt?.resolve,
    onProgress: (done, total) => {
      if (done % 25 === 0 || done === total) log.info(`Progress: ${done}/${total}`);
    },
  });

  let result: PipelineResult;
  try {
    result = await pipeline.run(entries);
  } finally {
    prompt?.close();
  }

  const outputs = writeResults(config.paths.outputDir, result);

  const summary: RunSummary = {
    runAt: new Date(startedAt).toISOString(),
    input: inputPath,
    total: entries.size,
    resolved: result.resolved.length,
    unresolved: result.unresolved.length,
    ambiguous: result.ambiguous.length,
    durationSec: (Date.now() - startedAt) / 1000,
    outputs,
  };

  if (config.report.enabled) {
    const runLogger = new RunLogger(config.paths.reportDir);
    summary.logPath = runLogger.writeLog(result.outcomes, new Date(startedAt));
    runLogger.writeStatus(summary);
  }

  log.success(`Processing complete. Saved ${summary.resolved} movies to ${outputs.resolved}`);
  log.info(`Saved ${summary.unresolved} not found entries to ${outputs.unresolved}`);
  log.info(`Saved ${summary.ambiguous} multiple match entries to ${outputs.ambiguous}`);
  if (summary.logPath) log.info(`Run log: ${summary.logPath}`);

  return summary;
}

export function makeResolveCommand(baseDir: string): Command {
  return new Command('list-resolver')
    .description('Resolve an exported movie list against the movie lookup API')
    .version('0.1.0')
    .argument('[file]', 'List page inside the input directory', DEFAULT_INPUT_FILE)
    .action(async (file: string) => {
      log.step('Movie List Resolver');
      log.info(`Config   : ${getConfigPath(baseDir) ?? '(defaults)'}`);
      try {
        const config = loadConfig(baseDir);
        log.info(`Input    : ${config.paths.inputDir}`);
        log.info(`Output   : ${config.paths.outputDir}`);
        log.info(`Lookup   : ${config.lookup.url}`);
        log.info(`Translate: ${config.translator.enabled ? config.translator.url : 'disabled'}`);
        await runResolve(config, file);
      } catch (err) {
        log.error(errorMessage(err));
      }
    });
}
